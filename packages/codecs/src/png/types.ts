/**
 * PNG color types
 */
export const ColorType = {
	Grayscale: 0,
	RGB: 2,
	Indexed: 3,
	GrayscaleAlpha: 4,
	RGBA: 6,
} as const

export type ColorType = (typeof ColorType)[keyof typeof ColorType]

/**
 * PNG filter types
 */
export const FilterType = {
	None: 0,
	Sub: 1,
	Up: 2,
	Average: 3,
	Paeth: 4,
} as const

export type FilterType = (typeof FilterType)[keyof typeof FilterType]

/**
 * Chunk types written or read by this codec
 */
export const ChunkType = {
	IHDR: 'IHDR',
	IDAT: 'IDAT',
	IEND: 'IEND',
} as const

/**
 * PNG signature bytes
 */
export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10])

/**
 * zlib level used for IDAT data
 */
export const COMPRESSION_LEVEL = 9

/**
 * IHDR chunk data
 */
export interface IHDRData {
	width: number
	height: number
	bitDepth: number
	colorType: number
	compressionMethod: number
	filterMethod: number
	interlaceMethod: number
}

/**
 * PNG chunk
 */
export interface PngChunk {
	/** Four-character chunk type, e.g. "IHDR" */
	type: string
	data: Uint8Array
	/** Stored CRC-32 over type + data */
	crc: number
}
