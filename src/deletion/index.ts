export { DeletionBudget } from './deletion-budget.js';
export { DeletionBudgeter } from './deletion-budgeter.js';
export { emptyOutcome, addOutcomes } from './types.js';
export type { DeletionKind, DeletionOutcome, DeletionBudgeterOptions } from './types.js';
