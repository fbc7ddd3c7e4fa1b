/**
 * The format tag for standard pulse-code modulation (PCM) audio.
 * @type {0x0001}
 * @constant
 */
export const WAVE_FORMAT_PCM: 0x0001 = 0x0001;

/**
 * The format tag for WAVEFORMATEXTENSIBLE. Accepted only when its SubFormat is `KSDATAFORMAT_SUBTYPE_PCM`.
 * @type {0xfffe}
 * @constant
 */
export const WAVE_FORMAT_EXTENSIBLE: 0xfffe = 0xfffe;

/**
 * The `KSDATAFORMAT_SUBTYPE_PCM` GUID as a `Uint8Array`.
 *
 * The SubFormat of a `WAVEFORMATEXTENSIBLE` chunk whose samples are plain integer PCM.
 */
export const KSDATAFORMAT_SUBTYPE_PCM: Uint8Array = new Uint8Array([
  0x01, 0x00, 0x00, 0x00, 0x00, 0x00, 0x10, 0x00, 0x80, 0x00, 0x00, 0xaa, 0x00, 0x38, 0x9b, 0x71,
]);

/** Body length of a `fmt ` chunk carrying the full WAVEFORMATEXTENSIBLE extension. */
export const FMT_EXTENSIBLE_SIZE = 40 as const;

/** Minimum `cbSize` of a WAVEFORMATEXTENSIBLE extension that includes a SubFormat. */
export const EXTENSIBLE_CB_SIZE = 22 as const;

/** FourCC of the RIFF container. */
export const RIFF_TAG = 'RIFF' as const;

/** FourCC at byte 8 identifying a WAVE form. */
export const WAVE_TAG = 'WAVE' as const;

export const FMT_CHUNK = 'fmt ' as const;

export const DATA_CHUNK = 'data' as const;

/**
 * Smallest buffer accepted by the header parser: RIFF header, a 16-byte `fmt ` chunk and a `data` chunk header.
 */
export const MIN_HEADER_SIZE = 44 as const;

/** Byte length of the mandatory part of a `fmt ` chunk body. */
export const FMT_CHUNK_MIN_SIZE = 16 as const;

/**
 * Data-chunk sizes some recorders leave in place when they never patch the header.
 * Either one means the data runs to the end of the buffer.
 */
export const UNKNOWN_DATA_SIZES: readonly number[] = [0, 0xffffffff];

/**
 * Divisor for unsigned 8-bit samples after re-centering on 128.
 * @type {127}
 * @constant
 */
export const DIV_8: 127 = 127;

/**
 * Divisor for signed 16-bit samples (positive-side maximum).
 * @type {32767}
 * @constant
 */
export const DIV_16: 32767 = 32767;

/**
 * Divisor for signed 24-bit samples (positive-side maximum).
 * @type {8388607}
 * @constant
 */
export const DIV_24: 8388607 = 8388607;

/**
 * Divisor for signed 32-bit samples (positive-side maximum).
 * @type {2147483647}
 * @constant
 */
export const DIV_32: 2147483647 = 2147483647;

/** Number of display points the viewer asks for when nothing else is specified. */
export const DEFAULT_TARGET_LENGTH = 1000 as const;

/** Number of output points handed to `onChunk` at a time. */
export const DEFAULT_CHUNK_SIZE = 1024 as const;

export const INITIAL_RING_BUFFER_CAPACITY = 16384 as const;

/** Upper bound on bytes buffered while waiting for the `data` chunk header. */
export const MAX_HEADER_SIZE = 65536 as const;
