declare module "seek-bzip" {
  /** Decompresses a complete bzip2 stream. */
  export function decode(input: Buffer, output?: Buffer): Buffer;
  export function decodeBlock(input: Buffer, blockStartBits: number, output?: Buffer): Buffer;
}
