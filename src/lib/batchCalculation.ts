import type { Diagnostic, LogisticsCostInput, LogisticsCostResult, PairInput } from '@/core/types';
import { validateLogisticsInput } from '@/core/validation';
import { createDiagnostics } from './diagnostics';
import { calculateLogisticsCost, type LogisticsCostOptions } from './logisticsCost';
import type { ReferenceLookup } from './referenceLookup';

export interface BatchSummary {
  pairsEvaluated: number;
  pairsSkipped: number;
  totalAnnualCost: number;
}

export interface BatchCalculationResult {
  results: LogisticsCostResult[];
  diagnostics: Diagnostic[];
  summary: BatchSummary;
}

const REQUIRED_RECORDS = ['packaging', 'transport', 'operations', 'warehouse', 'co2'] as const;

type RequiredRecord = (typeof REQUIRED_RECORDS)[number];

/** Narrow a pair to a full input; lists what is missing otherwise */
export function completePair(
  pair: PairInput
): { input: LogisticsCostInput; missing: [] } | { input: null; missing: RequiredRecord[] } {
  const { packaging, transport, operations, warehouse, co2 } = pair;
  if (packaging && transport && operations && warehouse && co2) {
    return {
      input: {
        ...pair,
        packaging,
        transport,
        operations,
        warehouse,
        co2,
        additionalCosts: pair.additionalCosts ?? [],
      },
      missing: [],
    };
  }
  return { input: null, missing: REQUIRED_RECORDS.filter((record) => !pair[record]) };
}

/**
 * Evaluate pre-resolved material/supplier pairs one by one. A pair without one of
 * the required configuration records is skipped; validation errors are reported but
 * the pair is still evaluated.
 */
export function calculateAllCosts(
  pairs: PairInput[],
  reference: ReferenceLookup,
  options?: LogisticsCostOptions
): BatchCalculationResult {
  const results: LogisticsCostResult[] = [];
  const diagnostics: Diagnostic[] = [];
  let pairsSkipped = 0;

  for (const pair of pairs) {
    const pairDiagnostics = createDiagnostics({
      materialNo: pair.material.materialNo,
      vendorId: pair.supplier.vendorId,
    });

    const { input, missing } = completePair(pair);
    if (!input) {
      const message = `Skipping ${pair.material.materialNo} / ${pair.supplier.vendorId}: missing ${missing.join(', ')} configuration`;
      console.warn('calculateAllCosts warning:', message);
      pairDiagnostics.record('configMissing', 'total', message);
      diagnostics.push(...pairDiagnostics.entries);
      pairsSkipped += 1;
      continue;
    }

    for (const error of validateLogisticsInput(input).errors) {
      pairDiagnostics.record('invalidConfig', 'total', error);
    }

    const result = calculateLogisticsCost(input, reference, options);
    const combined = [...pairDiagnostics.entries, ...result.diagnostics];
    results.push({ ...result, diagnostics: combined });
    diagnostics.push(...combined);
  }

  return {
    results,
    diagnostics,
    summary: {
      pairsEvaluated: results.length,
      pairsSkipped,
      totalAnnualCost: results.reduce((total, result) => total + result.totalAnnualCost, 0),
    },
  };
}
