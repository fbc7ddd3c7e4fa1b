import { DIV_32 } from '../../constants';
import { readInt32LE } from '../../utils/bytes';
import { clampUnit } from '../../utils/math';

export function decodePCM32(bytes: Uint8Array, offset: number): number {
  return clampUnit(readInt32LE(bytes, offset) / DIV_32);
}
