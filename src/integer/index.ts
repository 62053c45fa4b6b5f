/**
 * @file integer/index.ts
 * @brief Free-function integer operations over an explicit runtime
 */

export type { IntegerRuntime } from './runtime';

export {
  SUPPORTED_WIDTHS,
  isWidth,
  limbCount,
  sameType,
  typeName,
  typeRange,
  encodePlaintext,
  decodePlaintext,
} from './limbs';

export { add, sub, mul, negate, not, multiplyLimbs } from './arithmetic';
export type { Factor } from './arithmetic';

export { div, rem, revealingDivide } from './division';
export type { DivisionOp } from './division';

export {
  checkedAdd,
  checkedSub,
  checkedMul,
  checkedAddLHS,
  checkedAddRHS,
  checkedSubLHS,
  checkedSubRHS,
  checkedMulLHS,
  checkedMulRHS,
  checkedAddWithOverflowBit,
  checkedSubWithOverflowBit,
  checkedMulWithOverflowBit,
} from './checked';

export { and, or, xor, shl, shr } from './bitwise';

export { eq, ne, lt, gt, le, ge, min, max } from './comparator';

export {
  select,
  boolAnd,
  boolOr,
  boolXor,
  boolNot,
  boolEq,
  boolNe,
  boolSelect,
} from './select';

export {
  setPublic,
  decrypt,
  setPublicBool,
  decryptBool,
  validateCiphertext,
  onboard,
  offboard,
  offboardToUser,
  offboardCombined,
  joinUserCiphertext,
  random,
  randomBounded,
  resize,
} from './boundary';
