//
// Copyright (c) Microsoft.
// Licensed under the MIT license. See LICENSE file in the project root for full license information.
//

import { BudgetOutcome, type ICostCenterBudgets } from './types.js';

export type BudgetSummary = Record<BudgetOutcome, string[]>;

// Stops at the first cost center for which budgets are unavailable
export async function ensureBudgets(budgets: ICostCenterBudgets, costCenters: Map<string, string>): Promise<BudgetSummary> {
  const summary: BudgetSummary = {
    [BudgetOutcome.Created]: [],
    [BudgetOutcome.Exists]: [],
    [BudgetOutcome.Unavailable]: [],
    [BudgetOutcome.Failed]: [],
  };
  for (const [name, id] of costCenters) {
    const outcome = await budgets.ensureBudget(id, name);
    summary[outcome].push(name);
    if (outcome === BudgetOutcome.Unavailable) {
      console.warn('The budgets API is not available for this enterprise; no further budgets will be created');
      break;
    }
  }
  return summary;
}
