export { duplicateChargesRule } from './duplicateCharges.rule';
export { largeTransactionRule } from './largeTransaction.rule';
export { lowConfidenceRule } from './lowConfidence.rule';
export { categoryShiftRule } from './categoryShift.rule';
export { subscriptionRule } from './subscription.rule';
export { balanceDepletionRule } from './balanceDepletion.rule';
export { firstTimeVendorRule } from './firstTimeVendor.rule';
export { weekendSpikeRule } from './weekendSpike.rule';
export { taxDeductibleRule } from './taxDeductible.rule';
