/**
 * @module operations
 * Built-in filter and enhancement library behind the {@link OperationAdapter} contract.
 *
 * @packageDocumentation
 */

export { applyOperation, referenceAdapter } from './apply';
export type { OperationAdapter } from './apply';
export { convolve, clamp255 } from './convolve';
export { enhance, luma, meanLuma } from './enhance';
export { KERNELS } from './kernels';
export type { Kernel } from './kernels';
