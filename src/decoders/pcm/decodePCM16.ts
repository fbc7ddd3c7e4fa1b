import { DIV_16 } from '../../constants';
import { readInt16LE } from '../../utils/bytes';
import { clampUnit } from '../../utils/math';

export function decodePCM16(bytes: Uint8Array, offset: number): number {
  return clampUnit(readInt16LE(bytes, offset) / DIV_16);
}
