import { describe, expect, test } from 'vitest'
import type { ImageData } from './index'
import { byteLength, createImageData, detectFormat } from './index'

describe('core', () => {
	test('types export correctly', () => {
		const img: ImageData = { width: 1, height: 1, data: new Uint8Array(4) }
		expect(img.width).toBe(1)
	})

	test('createImageData fills every pixel', () => {
		const img = createImageData(2, 3, [1, 2, 3, 4])

		expect(img.data.length).toBe(24)
		expect(Array.from(img.data.slice(20))).toEqual([1, 2, 3, 4])
	})

	test('createImageData defaults to transparent black', () => {
		const img = createImageData(1, 1)
		expect(Array.from(img.data)).toEqual([0, 0, 0, 0])
	})

	test('createImageData rejects bad dimensions', () => {
		expect(() => createImageData(0, 4)).toThrow('width must be a positive integer (got 0)')
		expect(() => createImageData(4, 1.5)).toThrow(RangeError)
	})

	test('byteLength counts four bytes per pixel', () => {
		expect(byteLength(3, 5)).toBe(60)
	})
})

describe('format', () => {
	test('detects PNG and ICO signatures', () => {
		expect(detectFormat(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))).toBe(
			'png'
		)
		expect(detectFormat(new Uint8Array([0, 0, 1, 0, 1, 0]))).toBe('ico')
	})

	test('returns null for unknown or short data', () => {
		expect(detectFormat(new Uint8Array([0x89, 0x50]))).toBeNull()
		expect(detectFormat(new Uint8Array([1, 2, 3, 4]))).toBeNull()
	})
})
