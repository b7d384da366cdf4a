import type { CostComponent, Diagnostic, DiagnosticKind } from '@/core/types';
import { needsDivisorGuard, safeDivisor } from './costMath';

/**
 * Diagnostics for a single calculation call. Every call creates its own collector,
 * so pairs can be evaluated side by side without sharing a log.
 */
export interface DiagnosticsCollector {
  readonly entries: readonly Diagnostic[];
  record(kind: DiagnosticKind, component: CostComponent, message: string): void;
}

export function createDiagnostics(context?: {
  materialNo?: string;
  vendorId?: string;
}): DiagnosticsCollector {
  const entries: Diagnostic[] = [];
  return {
    entries,
    record(kind, component, message) {
      entries.push({
        kind,
        component,
        message,
        ...(context?.materialNo && { materialNo: context.materialNo }),
        ...(context?.vendorId && { vendorId: context.vendorId }),
      });
    },
  };
}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

/**
 * Run one engine behind a component boundary: any exception is recorded as a
 * computationException and the fallback value is returned instead.
 */
export function runComponent<T>(
  component: CostComponent,
  diagnostics: DiagnosticsCollector,
  fallback: T,
  compute: () => T
): T {
  try {
    return compute();
  } catch (err) {
    diagnostics.record('computationException', component, `${component} calculation error: ${errorMessage(err)}`);
    return fallback;
  }
}

/** safeDivisor that leaves a divisionGuard entry whenever it substitutes the floor */
export function guardDivisor(
  diagnostics: DiagnosticsCollector,
  component: CostComponent,
  label: string,
  value: number
): number {
  if (needsDivisorGuard(value)) {
    diagnostics.record('divisionGuard', component, `${label} is ${value}; using 1 as divisor`);
  }
  return safeDivisor(value);
}
