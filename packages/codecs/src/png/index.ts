export { crc32 } from './crc'
export { decodePng, readChunks } from './decoder'
export { createChunk, encodePng, serializeScanlines } from './encoder'
export type { IHDRData, PngChunk } from './types'
export { COMPRESSION_LEVEL, ChunkType, ColorType, FilterType, PNG_SIGNATURE } from './types'
