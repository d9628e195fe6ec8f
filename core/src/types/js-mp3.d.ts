// js-mp3 ships without type declarations
declare module 'js-mp3' {
  export interface Mp3StreamDecoder {
    /** Decode every remaining frame to interleaved 16-bit little-endian stereo PCM. */
    decode(): ArrayBuffer | null;
  }

  /** Returns null when no frame can be read from `data`. */
  export function newDecoder(data: ArrayBufferLike): Mp3StreamDecoder | null;
}
