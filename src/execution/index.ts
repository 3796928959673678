/**
 * Execution Layer
 * Parameter builders for each position manager write
 */

export * from './openPosition';
export * from './increaseLiquidity';
export * from './removeLiquidity';
export * from './collectFees';
