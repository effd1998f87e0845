export { Tensor, stack, tensor, type Nested } from './tensor.ts'
export { dtypeOf, isScalar, zeroOf } from './dtype.ts'
