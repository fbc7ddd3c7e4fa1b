import { describe, expect, it } from 'vitest';
import { WaveFile } from 'wavefile';
import { MalformedHeaderError, isWavError, parseHeader } from '../src';
import { SUBTYPE_PCM, buildPcmWav, createTestBuffer, extensibleFmtChunk, fmtChunk } from './fixtures';
import { findStringInUint8Array } from './utils/helpers';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

const FMT_16_MONO = fmtChunk({ channels: 1, sampleRate: 8000, bitsPerSample: 16 });

describe('parseHeader', () => {
  it('parses a canonical 16-bit mono header', () => {
    const header = parseHeader(buildPcmWav({ bitsPerSample: 16, values: [0, 16384, -16384, 32767] }));
    expect(header).toEqual({
      formatTag: 1,
      channelCount: 1,
      sampleRateHz: 8000,
      bitsPerSample: 16,
      dataOffset: 44,
      dataLength: 8,
      declaredDataLength: 8,
      subFormat: null,
    });
    expect(Object.isFrozen(header)).toBe(true);
  });

  it.each([
    { channels: 1, sampleRate: 44100, bits: '16', desc: 'mono 16-bit' },
    { channels: 2, sampleRate: 48000, bits: '24', desc: 'stereo 24-bit' },
    { channels: 1, sampleRate: 22050, bits: '8', desc: 'mono 8-bit' },
    { channels: 2, sampleRate: 16000, bits: '32', desc: 'stereo 32-bit' },
  ])('parses a wavefile-generated $desc header', (fmt) => {
    const wav = new WaveFile();
    wav.fromScratch(fmt.channels, fmt.sampleRate, fmt.bits, [0, 1, -1, 2, -2, 3, -3, 4]);
    const bytes = wav.toBuffer();
    const header = parseHeader(bytes);

    expect(header.channelCount).toBe(fmt.channels);
    expect(header.sampleRateHz).toBe(fmt.sampleRate);
    expect(header.bitsPerSample).toBe(Number(fmt.bits));
    expect(header.dataOffset).toBe(findStringInUint8Array(bytes, 'data') + 8);
    expect(header.dataLength).toBe(8 * (Number(fmt.bits) / 8));
  });

  describe('rejections', () => {
    it('rejects a buffer of 10 zero bytes as too small', () => {
      const err = captureError(() => parseHeader(new Uint8Array(10)));
      expect(err).toBeInstanceOf(MalformedHeaderError);
      expect(err).toMatchObject({ code: 'MALFORMED_HEADER', reason: 'too-small', byteLength: 10 });
    });

    it('rejects an empty buffer', () => {
      expect(() => parseHeader(new Uint8Array(0))).toThrow(MalformedHeaderError);
    });

    it('reports the tag found instead of RIFF', () => {
      const bytes = createTestBuffer({
        riffTag: 'RIFX',
        chunks: [
          { id: 'fmt ', data: FMT_16_MONO },
          { id: 'data', data: new Uint8Array(8) },
        ],
      });
      const err = captureError(() => parseHeader(bytes));
      expect(err).toMatchObject({ reason: 'bad-riff-tag', found: 'RIFX' });
      expect((err as Error).message).toBe('Missing "RIFF" signature at byte 0 (found "RIFX")');
    });

    it('reports the tag found instead of WAVE', () => {
      const bytes = createTestBuffer({
        waveTag: 'AVI ',
        chunks: [
          { id: 'fmt ', data: FMT_16_MONO },
          { id: 'data', data: new Uint8Array(8) },
        ],
      });
      const err = captureError(() => parseHeader(bytes));
      expect(err).toBeInstanceOf(MalformedHeaderError);
      expect(err).toMatchObject({ reason: 'bad-wave-tag', found: 'AVI ' });
    });

    it('checks the RIFF tag before the WAVE tag', () => {
      const bytes = createTestBuffer({
        riffTag: 'JUNK',
        waveTag: 'JUNK',
        chunks: [{ id: 'data', data: new Uint8Array(32) }],
      });
      expect(captureError(() => parseHeader(bytes))).toMatchObject({ reason: 'bad-riff-tag' });
    });

    it('rejects a header without a data chunk', () => {
      const bytes = createTestBuffer({
        chunks: [
          { id: 'fmt ', data: FMT_16_MONO },
          { id: 'LIST', data: new Uint8Array(24) },
        ],
      });
      const err = captureError(() => parseHeader(bytes));
      expect(err).toMatchObject({ reason: 'missing-chunk', missing: ['data'] });
      expect((err as Error).message).toBe('Missing required "data" chunk');
    });

    it('rejects a header without a fmt chunk', () => {
      const bytes = createTestBuffer({
        chunks: [
          { id: 'junk', data: new Uint8Array(24) },
          { id: 'data', data: new Uint8Array(8) },
        ],
      });
      expect(captureError(() => parseHeader(bytes))).toMatchObject({ reason: 'missing-chunk', missing: ['fmt '] });
    });

    it('names both chunks when neither is present', () => {
      const bytes = createTestBuffer({ chunks: [{ id: 'junk', data: new Uint8Array(40) }] });
      const err = captureError(() => parseHeader(bytes));
      expect(err).toMatchObject({ missing: ['fmt ', 'data'] });
      expect((err as Error).message).toBe('Missing required "fmt " and "data" chunk');
    });
  });

  describe('chunk scan', () => {
    it('skips odd-sized chunks including their pad byte', () => {
      const header = parseHeader(
        buildPcmWav({ bitsPerSample: 16, values: [1, 2], before: [{ id: 'junk', data: new Uint8Array(3) }] })
      );
      // junk: 12 + 8 + 3 + pad, fmt: 24 + 8 + 16, data header: 48 + 8
      expect(header.dataOffset).toBe(56);
      expect(header.dataLength).toBe(4);
    });

    it('stops at the declared data size when more chunks follow', () => {
      const header = parseHeader(
        buildPcmWav({ bitsPerSample: 16, values: [1, 2, 3, 4], after: [{ id: 'LIST', data: new Uint8Array(4) }] })
      );
      expect(header.dataLength).toBe(8);
    });

    it('never extends the data region past the end of the buffer', () => {
      const header = parseHeader(buildPcmWav({ bitsPerSample: 16, values: [1, 2, 3, 4], dataSize: 100 }));
      expect(header.declaredDataLength).toBe(100);
      expect(header.dataLength).toBe(8);
    });

    it.each([0, 0xffffffff])('reads to the end of the buffer when the data size is the placeholder %d', (size) => {
      const header = parseHeader(buildPcmWav({ bitsPerSample: 16, values: [1, 2, 3, 4], dataSize: size }));
      expect(header.declaredDataLength).toBe(size);
      expect(header.dataLength).toBe(8);
    });

    it('does not validate bit depth while parsing', () => {
      const bytes = createTestBuffer({
        chunks: [
          { id: 'fmt ', data: fmtChunk({ channels: 1, sampleRate: 8000, bitsPerSample: 12 }) },
          { id: 'data', data: new Uint8Array(12) },
        ],
      });
      expect(parseHeader(bytes).bitsPerSample).toBe(12);
    });

    it('reads the SubFormat of a WAVE_FORMAT_EXTENSIBLE chunk', () => {
      const bytes = createTestBuffer({
        chunks: [
          { id: 'fmt ', data: extensibleFmtChunk({ channels: 2, sampleRate: 48000, bitsPerSample: 24, subFormat: SUBTYPE_PCM }) },
          { id: 'data', data: new Uint8Array(12) },
        ],
      });
      const header = parseHeader(bytes);

      expect(header.formatTag).toBe(0xfffe);
      expect(header.subFormat).toEqual(SUBTYPE_PCM);
      // fmt: 12 + 8 + 40, data header: 60 + 8
      expect(header.dataOffset).toBe(68);
    });

    it('leaves the SubFormat unset when cbSize does not cover it', () => {
      const fmt = extensibleFmtChunk({ channels: 1, sampleRate: 8000, bitsPerSample: 16, subFormat: SUBTYPE_PCM });
      fmt[16] = 0;
      const bytes = createTestBuffer({
        chunks: [
          { id: 'fmt ', data: fmt },
          { id: 'data', data: new Uint8Array(4) },
        ],
      });
      expect(parseHeader(bytes).subFormat).toBeNull();
    });
  });
});

describe('isWavError', () => {
  it('recognizes header errors and nothing else', () => {
    const err = captureError(() => parseHeader(new Uint8Array(10)));

    expect(isWavError(err)).toBe(true);
    expect(err).toMatchObject({ name: 'MalformedHeaderError', code: 'MALFORMED_HEADER', reason: 'too-small' });
    expect(isWavError(new Error('File is too small'))).toBe(false);
    expect(isWavError(undefined)).toBe(false);
  });
});
