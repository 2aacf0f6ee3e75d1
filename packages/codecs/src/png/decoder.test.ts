import { deflateSync, inflateSync } from 'node:zlib'
import { describe, expect, test } from 'vitest'
import { crc32 } from './crc'
import { decodePng, readChunks } from './decoder'
import { createChunk, encodePng, serializeScanlines } from './encoder'
import { PNG_SIGNATURE } from './types'

function ihdr(width: number, height: number, colorType: number): Uint8Array {
	return new Uint8Array([
		0,
		0,
		0,
		width,
		0,
		0,
		0,
		height,
		8,
		colorType,
		0,
		0,
		0,
	])
}

function assemble(...chunks: Uint8Array[]): Uint8Array {
	const parts = [PNG_SIGNATURE, ...chunks]
	const output = new Uint8Array(parts.reduce((sum, p) => sum + p.length, 0))
	let offset = 0
	for (const part of parts) {
		output.set(part, offset)
		offset += part.length
	}
	return output
}

/** 2x2 RGB image, first row Sub-filtered, second row given */
function filteredRgb(secondRow: readonly number[]): Uint8Array {
	const raw = new Uint8Array([1, 10, 20, 30, 5, 5, 5, ...secondRow])
	return assemble(
		createChunk('IHDR', ihdr(2, 2, 2)),
		createChunk('IDAT', deflateSync(raw)),
		createChunk('IEND', new Uint8Array(0))
	)
}

describe('PNG Codec', () => {
	test('encode and decode roundtrip', () => {
		const original = {
			width: 2,
			height: 2,
			data: new Uint8Array([
				255, 0, 0, 255, 0, 255, 0, 255,
				0, 0, 255, 255, 255, 255, 255, 128,
			]),
		}

		const encoded = encodePng(original)

		expect(Array.from(encoded.slice(0, 8))).toEqual([137, 80, 78, 71, 13, 10, 26, 10])

		const decoded = decodePng(encoded)

		expect(decoded.width).toBe(2)
		expect(decoded.height).toBe(2)
		expect(decoded.data).toEqual(original.data)
	})

	test('writes IHDR, IDAT and IEND in order', () => {
		const image = { width: 3, height: 2, data: new Uint8Array(3 * 2 * 4).fill(7) }
		const chunks = readChunks(encodePng(image))

		expect(chunks.map((c) => c.type)).toEqual(['IHDR', 'IDAT', 'IEND'])
		expect(Array.from(chunks[0]!.data)).toEqual([0, 0, 0, 3, 0, 0, 0, 2, 8, 6, 0, 0, 0])
		expect(chunks[2]!.data.length).toBe(0)
		expect(chunks[2]!.crc).toBe(0xae426082)
	})

	test('IHDR chunk is length-prefixed and CRC-suffixed', () => {
		const image = { width: 1, height: 1, data: new Uint8Array([1, 2, 3, 4]) }
		const encoded = encodePng(image)

		// Length 13, then "IHDR"
		expect(Array.from(encoded.slice(8, 16))).toEqual([0, 0, 0, 13, 73, 72, 68, 82])

		const expectedCrc = crc32(encoded, 12, 17)
		const storedCrc =
			((encoded[29]! << 24) | (encoded[30]! << 16) | (encoded[31]! << 8) | encoded[32]!) >>> 0
		expect(storedCrc).toBe(expectedCrc)
	})

	test('IDAT holds best-compression zlib data of unfiltered scanlines', () => {
		const image = {
			width: 2,
			height: 2,
			data: new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16]),
		}
		const idat = readChunks(encodePng(image))[1]!

		expect(idat.data[0]).toBe(0x78)
		expect(idat.data[1]).toBe(0xda)
		expect(Array.from(inflateSync(idat.data))).toEqual([
			0, 1, 2, 3, 4, 5, 6, 7, 8,
			0, 9, 10, 11, 12, 13, 14, 15, 16,
		])
	})

	test('serializeScanlines prefixes each row with filter None', () => {
		const image = { width: 1, height: 3, data: new Uint8Array(12).fill(255) }
		const raw = serializeScanlines(image)

		expect(raw.length).toBe(15)
		expect([raw[0], raw[5], raw[10]]).toEqual([0, 0, 0])
	})

	test('encode rejects mismatched buffers', () => {
		expect(() => encodePng({ width: 2, height: 2, data: new Uint8Array(15) })).toThrow(
			'Pixel buffer length 15 does not match 2x2 RGBA'
		)
		expect(() => encodePng({ width: 0, height: 2, data: new Uint8Array(0) })).toThrow(RangeError)
	})

	test('createChunk rejects bad chunk types', () => {
		expect(() => createChunk('IDATA', new Uint8Array(0))).toThrow('Chunk type must be 4 characters')
	})

	test('decode throws on invalid signature', () => {
		const invalid = new Uint8Array([0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00])
		expect(() => decodePng(invalid)).toThrow('Invalid PNG signature')
	})

	test('decode detects corrupted chunk data', () => {
		const image = { width: 4, height: 4, data: new Uint8Array(64).fill(200) }
		const encoded = encodePng(image)
		// First IDAT payload byte: signature (8) + IHDR chunk (25) + length and type (8)
		encoded[41] = encoded[41]! ^ 0xff

		expect(() => decodePng(encoded)).toThrow('CRC mismatch in chunk IDAT')
	})

	test('decode detects truncated data', () => {
		const encoded = encodePng({ width: 1, height: 1, data: new Uint8Array(4) })
		expect(() => decodePng(encoded.slice(0, 30))).toThrow('Truncated IHDR chunk at offset 8')
	})

	test('decode requires IEND', () => {
		const png = assemble(
			createChunk('IHDR', ihdr(1, 1, 6)),
			createChunk('IDAT', deflateSync(new Uint8Array([0, 1, 2, 3, 4])))
		)
		expect(() => decodePng(png)).toThrow('Missing IEND chunk')
	})

	test('decode rejects unsupported color types', () => {
		const png = assemble(
			createChunk('IHDR', ihdr(1, 1, 3)),
			createChunk('IDAT', deflateSync(new Uint8Array([0, 0]))),
			createChunk('IEND', new Uint8Array(0))
		)
		expect(() => decodePng(png)).toThrow('Unsupported PNG color type: 3')
	})

	const expectedRgba = [10, 20, 30, 255, 15, 25, 35, 255, 12, 22, 32, 255, 20, 30, 40, 255]

	test.each<[string, number[]]>([
		['Up', [2, 2, 2, 2, 5, 5, 5]],
		['Average', [3, 7, 12, 17, 7, 7, 7]],
		['Paeth', [4, 2, 2, 2, 5, 5, 5]],
	])('decode reverses Sub and %s filters on RGB data', (_name, secondRow) => {
		const decoded = decodePng(filteredRgb(secondRow))

		expect(decoded.width).toBe(2)
		expect(decoded.height).toBe(2)
		expect(Array.from(decoded.data)).toEqual(expectedRgba)
	})

	test('crc32 matches the standard check value', () => {
		const input = new TextEncoder().encode('123456789')
		expect(crc32(input)).toBe(0xcbf43926)
	})
})
