import { inflateSync } from 'node:zlib'
import type { ImageData } from '@monogram/core'
import { crc32 } from './crc'
import { ChunkType, ColorType, FilterType, type IHDRData, PNG_SIGNATURE, type PngChunk } from './types'

/**
 * Read 32-bit big-endian unsigned integer
 */
function readU32BE(data: Uint8Array, offset: number): number {
	return (
		((data[offset]! << 24) |
			(data[offset + 1]! << 16) |
			(data[offset + 2]! << 8) |
			data[offset + 3]!) >>>
		0
	)
}

function readType(data: Uint8Array, offset: number): string {
	return String.fromCharCode(data[offset]!, data[offset + 1]!, data[offset + 2]!, data[offset + 3]!)
}

/**
 * Parse PNG chunks, verifying each CRC. Stops after IEND.
 */
export function readChunks(data: Uint8Array): PngChunk[] {
	for (let i = 0; i < PNG_SIGNATURE.length; i++) {
		if (data[i] !== PNG_SIGNATURE[i]) {
			throw new Error('Invalid PNG signature')
		}
	}

	const chunks: PngChunk[] = []
	let offset = PNG_SIGNATURE.length

	while (offset < data.length) {
		if (offset + 12 > data.length) {
			throw new Error(`Truncated chunk header at offset ${offset}`)
		}

		const length = readU32BE(data, offset)
		const type = readType(data, offset + 4)
		if (offset + 12 + length > data.length) {
			throw new Error(`Truncated ${type} chunk at offset ${offset}`)
		}

		const crc = readU32BE(data, offset + 8 + length)
		if (crc32(data, offset + 4, length + 4) !== crc) {
			throw new Error(`CRC mismatch in chunk ${type}`)
		}

		chunks.push({ type, data: data.slice(offset + 8, offset + 8 + length), crc })
		offset += 12 + length

		if (type === ChunkType.IEND) break
	}

	return chunks
}

/**
 * Parse IHDR chunk
 */
function parseIHDR(data: Uint8Array): IHDRData {
	if (data.length !== 13) {
		throw new Error('Invalid IHDR chunk length')
	}

	return {
		width: readU32BE(data, 0),
		height: readU32BE(data, 4),
		bitDepth: data[8]!,
		colorType: data[9]!,
		compressionMethod: data[10]!,
		filterMethod: data[11]!,
		interlaceMethod: data[12]!,
	}
}

/**
 * Paeth predictor
 */
function paethPredictor(a: number, b: number, c: number): number {
	const p = a + b - c
	const pa = Math.abs(p - a)
	const pb = Math.abs(p - b)
	const pc = Math.abs(p - c)

	if (pa <= pb && pa <= pc) return a
	if (pb <= pc) return b
	return c
}

/**
 * Unfilter a scanline in place
 */
function unfilterScanline(
	filter: number,
	current: Uint8Array,
	previous: Uint8Array | null,
	bpp: number
): void {
	const len = current.length

	switch (filter) {
		case FilterType.None:
			break

		case FilterType.Sub:
			for (let i = bpp; i < len; i++) {
				current[i] = (current[i]! + current[i - bpp]!) & 0xff
			}
			break

		case FilterType.Up:
			if (previous) {
				for (let i = 0; i < len; i++) {
					current[i] = (current[i]! + previous[i]!) & 0xff
				}
			}
			break

		case FilterType.Average:
			for (let i = 0; i < len; i++) {
				const a = i >= bpp ? current[i - bpp]! : 0
				const b = previous ? previous[i]! : 0
				current[i] = (current[i]! + Math.floor((a + b) / 2)) & 0xff
			}
			break

		case FilterType.Paeth:
			for (let i = 0; i < len; i++) {
				const a = i >= bpp ? current[i - bpp]! : 0
				const b = previous ? previous[i]! : 0
				const c = i >= bpp && previous ? previous[i - bpp]! : 0
				current[i] = (current[i]! + paethPredictor(a, b, c)) & 0xff
			}
			break

		default:
			throw new Error(`Unknown filter type: ${filter}`)
	}
}

function channelsFor(colorType: number): number {
	if (colorType === ColorType.RGBA) return 4
	if (colorType === ColorType.RGB) return 3
	throw new Error(`Unsupported PNG color type: ${colorType}`)
}

/**
 * Decode an 8-bit RGB or RGBA, non-interlaced PNG to ImageData
 */
export function decodePng(data: Uint8Array): ImageData {
	const chunks = readChunks(data)

	const ihdrChunk = chunks[0]
	if (!ihdrChunk || ihdrChunk.type !== ChunkType.IHDR) {
		throw new Error('Missing IHDR chunk')
	}
	const ihdr = parseIHDR(ihdrChunk.data)

	if (ihdr.width === 0 || ihdr.height === 0) {
		throw new Error('Invalid PNG dimensions')
	}
	if (ihdr.bitDepth !== 8) {
		throw new Error(`Unsupported PNG bit depth: ${ihdr.bitDepth}`)
	}
	if (ihdr.compressionMethod !== 0) {
		throw new Error('Unknown compression method')
	}
	if (ihdr.filterMethod !== 0) {
		throw new Error('Unknown filter method')
	}
	if (ihdr.interlaceMethod !== 0) {
		throw new Error('Interlaced PNG not supported')
	}
	if (chunks[chunks.length - 1]?.type !== ChunkType.IEND) {
		throw new Error('Missing IEND chunk')
	}

	const bpp = channelsFor(ihdr.colorType)

	// Concatenate IDAT chunks
	const idatChunks = chunks.filter((c) => c.type === ChunkType.IDAT)
	if (idatChunks.length === 0) {
		throw new Error('Missing IDAT chunk')
	}
	const compressed = new Uint8Array(idatChunks.reduce((sum, c) => sum + c.data.length, 0))
	let offset = 0
	for (const chunk of idatChunks) {
		compressed.set(chunk.data, offset)
		offset += chunk.data.length
	}

	const decompressed = inflateSync(compressed)

	const scanlineBytes = ihdr.width * bpp
	const expectedBytes = (scanlineBytes + 1) * ihdr.height
	if (decompressed.length < expectedBytes) {
		throw new Error(`Decompressed data too short: ${decompressed.length} < ${expectedBytes}`)
	}

	const output = new Uint8Array(ihdr.width * ihdr.height * 4)
	let prevScanline: Uint8Array | null = null

	for (let y = 0; y < ihdr.height; y++) {
		const start = y * (scanlineBytes + 1)
		const filterByte = decompressed[start]!
		const scanline = new Uint8Array(decompressed.subarray(start + 1, start + 1 + scanlineBytes))
		unfilterScanline(filterByte, scanline, prevScanline, bpp)

		for (let x = 0; x < ihdr.width; x++) {
			const src = x * bpp
			const dst = (y * ihdr.width + x) * 4
			output[dst] = scanline[src]!
			output[dst + 1] = scanline[src + 1]!
			output[dst + 2] = scanline[src + 2]!
			output[dst + 3] = bpp === 4 ? scanline[src + 3]! : 255
		}

		prevScanline = scanline
	}

	return {
		width: ihdr.width,
		height: ihdr.height,
		data: output,
	}
}
