import { DIV_24 } from '../../constants';
import { readInt24LE } from '../../utils/bytes';
import { clampUnit } from '../../utils/math';

export function decodePCM24(bytes: Uint8Array, offset: number): number {
  return clampUnit(readInt24LE(bytes, offset) / DIV_24);
}
