/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * RGBA color, one byte per channel
 */
export type Color = readonly [number, number, number, number]

/**
 * Output formats the generator writes
 */
export type ImageFormat = 'png' | 'ico'

/**
 * Check that a dimension is a positive integer
 */
export function assertDimension(name: string, value: number): void {
	if (!Number.isInteger(value) || value <= 0) {
		throw new RangeError(`${name} must be a positive integer (got ${value})`)
	}
}

/**
 * Create ImageData filled with a single color
 */
export function createImageData(
	width: number,
	height: number,
	color: Color = [0, 0, 0, 0]
): ImageData {
	assertDimension('width', width)
	assertDimension('height', height)

	const data = new Uint8Array(byteLength(width, height))
	const [r, g, b, a] = color
	for (let i = 0; i < data.length; i += 4) {
		data[i] = r
		data[i + 1] = g
		data[i + 2] = b
		data[i + 3] = a
	}
	return { width, height, data }
}

/**
 * Expected byte length of an RGBA buffer
 */
export function byteLength(width: number, height: number): number {
	return width * height * 4
}
