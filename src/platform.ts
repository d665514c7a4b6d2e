/**
 * Platform-native pointer width, used for the size types
 */

import { log } from './config'

export type PointerWidth = 32 | 64

const ARCH_POINTER_WIDTH = new Map<string, PointerWidth>([
  ['arm', 32],
  ['ia32', 32],
  ['mips', 32],
  ['mipsel', 32],
  ['ppc', 32],
  ['s390', 32],
  ['arm64', 64],
  ['loong64', 64],
  ['mips64el', 64],
  ['ppc64', 64],
  ['riscv64', 64],
  ['s390x', 64],
  ['x64', 64],
])

/**
 * Returns the pointer width of a Node.js architecture name.
 * Unknown architectures are assumed to be 64-bit.
 */
export function pointerWidthFor(arch: string): PointerWidth {
  const width = ARCH_POINTER_WIDTH.get(arch)
  if (width === undefined) {
    log('warn', `Unknown architecture "${arch}", assuming 64-bit size types`)
    return 64
  }
  return width
}

export const POINTER_WIDTH: PointerWidth = pointerWidthFor(process.arch)
