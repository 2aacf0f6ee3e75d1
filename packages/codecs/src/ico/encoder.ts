import { assertDimension } from '@monogram/core'
import { ICONDIRENTRY_SIZE, ICONDIR_SIZE, ICO_TYPE, type IcoSource } from './types'

/**
 * Write 16-bit little-endian value
 */
function writeU16LE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = value & 0xff
	data[offset + 1] = (value >>> 8) & 0xff
}

/**
 * Write 32-bit little-endian value
 */
function writeU32LE(data: Uint8Array, offset: number, value: number): void {
	data[offset] = value & 0xff
	data[offset + 1] = (value >>> 8) & 0xff
	data[offset + 2] = (value >>> 16) & 0xff
	data[offset + 3] = (value >>> 24) & 0xff
}

/**
 * Directory byte for a dimension; 0 stands for 256 or larger
 */
function dimensionByte(value: number): number {
	return value < 256 ? value : 0
}

/**
 * Wrap already-encoded PNG images into an ICO file.
 *
 * Layout: ICONDIR, one ICONDIRENTRY per image, then the PNG bytes in entry
 * order. Color count, planes and bit count are written as 0.
 */
export function encodeIco(sources: readonly IcoSource[]): Uint8Array {
	if (sources.length === 0) {
		throw new Error('At least one image is required')
	}

	for (const source of sources) {
		assertDimension('ICO image width', source.width)
		assertDimension('ICO image height', source.height)
	}

	const directorySize = ICONDIR_SIZE + ICONDIRENTRY_SIZE * sources.length
	const totalSize = sources.reduce((sum, s) => sum + s.png.length, directorySize)
	const output = new Uint8Array(totalSize)

	// ICONDIR header
	writeU16LE(output, 0, 0) // Reserved
	writeU16LE(output, 2, ICO_TYPE)
	writeU16LE(output, 4, sources.length)

	let imageOffset = directorySize

	for (let i = 0; i < sources.length; i++) {
		const source = sources[i]!
		const entry = ICONDIR_SIZE + i * ICONDIRENTRY_SIZE

		output[entry] = dimensionByte(source.width)
		output[entry + 1] = dimensionByte(source.height)
		output[entry + 2] = 0 // Color count
		output[entry + 3] = 0 // Reserved
		writeU16LE(output, entry + 4, 0) // Planes
		writeU16LE(output, entry + 6, 0) // Bit count
		writeU32LE(output, entry + 8, source.png.length)
		writeU32LE(output, entry + 12, imageOffset)

		output.set(source.png, imageOffset)
		imageOffset += source.png.length
	}

	return output
}
