import { DIV_8 } from '../../constants';
import { clampUnit } from '../../utils/math';

/** Unsigned 8-bit sample re-centered on 128. The lowest code (0) clamps to -1. */
export function decodePCM8(bytes: Uint8Array, offset: number): number {
  return clampUnit((bytes[offset]! - 128) / DIV_8);
}
