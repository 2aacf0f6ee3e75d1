import { deflateSync } from 'node:zlib'
import { type ImageData, assertDimension, byteLength } from '@monogram/core'
import { crc32 } from './crc'
import { COMPRESSION_LEVEL, ChunkType, ColorType, FilterType, PNG_SIGNATURE } from './types'

/**
 * Write 32-bit big-endian unsigned integer
 */
function writeU32BE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = (value >>> 24) & 0xff
	data[offset + 1] = (value >>> 16) & 0xff
	data[offset + 2] = (value >>> 8) & 0xff
	data[offset + 3] = value & 0xff
}

/**
 * Create a PNG chunk: length, type, data, CRC over type + data
 */
export function createChunk(type: string, data: Uint8Array): Uint8Array {
	if (type.length !== 4) {
		throw new Error(`Chunk type must be 4 characters (got "${type}")`)
	}

	const chunk = new Uint8Array(12 + data.length)

	// Length
	writeU32BE(chunk, 0, data.length)

	// Type
	for (let i = 0; i < 4; i++) {
		chunk[4 + i] = type.charCodeAt(i)
	}

	// Data
	chunk.set(data, 8)

	// CRC
	const crc = crc32(chunk, 4, data.length + 4)
	writeU32BE(chunk, 8 + data.length, crc)

	return chunk
}

/**
 * Create IHDR chunk for 8-bit RGBA
 */
function createIHDR(width: number, height: number): Uint8Array {
	const data = new Uint8Array(13)
	writeU32BE(data, 0, width)
	writeU32BE(data, 4, height)
	data[8] = 8 // Bit depth
	data[9] = ColorType.RGBA
	data[10] = 0 // Compression method
	data[11] = 0 // Filter method
	data[12] = 0 // Interlace method
	return createChunk(ChunkType.IHDR, data)
}

/**
 * Prefix every scanline with filter type None
 */
export function serializeScanlines(image: ImageData): Uint8Array {
	const { width, height, data } = image
	const scanlineBytes = width * 4
	const raw = new Uint8Array((scanlineBytes + 1) * height)

	for (let y = 0; y < height; y++) {
		const offset = y * (scanlineBytes + 1)
		raw[offset] = FilterType.None
		raw.set(data.subarray(y * scanlineBytes, (y + 1) * scanlineBytes), offset + 1)
	}

	return raw
}

/**
 * Create IDAT chunk
 */
function createIDAT(image: ImageData): Uint8Array {
	const compressed = deflateSync(serializeScanlines(image), { level: COMPRESSION_LEVEL })
	return createChunk(ChunkType.IDAT, compressed)
}

/**
 * Create IEND chunk
 */
function createIEND(): Uint8Array {
	return createChunk(ChunkType.IEND, new Uint8Array(0))
}

/**
 * Encode ImageData to PNG (8-bit RGBA, unfiltered scanlines, best zlib compression)
 */
export function encodePng(image: ImageData): Uint8Array {
	const { width, height } = image

	assertDimension('width', width)
	assertDimension('height', height)
	if (image.data.length !== byteLength(width, height)) {
		throw new Error(
			`Pixel buffer length ${image.data.length} does not match ${width}x${height} RGBA`
		)
	}

	const chunks = [createIHDR(width, height), createIDAT(image), createIEND()]

	const totalSize = PNG_SIGNATURE.length + chunks.reduce((sum, c) => sum + c.length, 0)
	const output = new Uint8Array(totalSize)

	output.set(PNG_SIGNATURE, 0)
	let offset = PNG_SIGNATURE.length
	for (const chunk of chunks) {
		output.set(chunk, offset)
		offset += chunk.length
	}

	return output
}
