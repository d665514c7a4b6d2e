export { toBigInt } from './infallible-to-big-int'
export type { InfallibleToBigInt, ToBigIntSource } from './infallible-to-big-int'
export { toBigUint } from './infallible-to-big-uint'
export type { InfallibleToBigUint, ToBigUintSource } from './infallible-to-big-uint'
export { tryToBigInt, tryToBigUint } from './fallible'
export { expectConversion } from './expect'
export type { ConversionTarget } from './expect'
