import { type ImageData, detectFormat } from '@monogram/core'
import { decodePng } from '../png'
import {
	CUR_TYPE,
	ICONDIRENTRY_SIZE,
	ICONDIR_SIZE,
	ICO_TYPE,
	type IcoImage,
	type IconDir,
	type IconDirEntry,
} from './types'

/**
 * Read 16-bit little-endian value
 */
function readU16LE(data: Uint8Array, offset: number): number {
	return data[offset]! | (data[offset + 1]! << 8)
}

/**
 * Read 32-bit little-endian value
 */
function readU32LE(data: Uint8Array, offset: number): number {
	return (
		(data[offset]! |
			(data[offset + 1]! << 8) |
			(data[offset + 2]! << 16) |
			(data[offset + 3]! << 24)) >>>
		0
	)
}

/**
 * Read ICONDIR header
 */
function readIconDir(data: Uint8Array): IconDir {
	return {
		reserved: readU16LE(data, 0),
		type: readU16LE(data, 2),
		count: readU16LE(data, 4),
	}
}

/**
 * Read ICONDIRENTRY
 */
function readIconDirEntry(data: Uint8Array, offset: number): IconDirEntry {
	return {
		width: data[offset]!,
		height: data[offset + 1]!,
		colorCount: data[offset + 2]!,
		reserved: data[offset + 3]!,
		planes: readU16LE(data, offset + 4),
		bitCount: readU16LE(data, offset + 6),
		bytesInRes: readU32LE(data, offset + 8),
		imageOffset: readU32LE(data, offset + 12),
	}
}

/**
 * Parse ICO file structure
 */
export function parseIco(data: Uint8Array): IcoImage {
	if (data.length < ICONDIR_SIZE) {
		throw new Error('Invalid ICO file: header truncated')
	}

	const header = readIconDir(data)

	if (header.reserved !== 0) {
		throw new Error('Invalid ICO file: reserved must be 0')
	}

	if (header.type !== ICO_TYPE && header.type !== CUR_TYPE) {
		throw new Error(`Invalid ICO file: unknown type ${header.type}`)
	}

	if (data.length < ICONDIR_SIZE + header.count * ICONDIRENTRY_SIZE) {
		throw new Error('Invalid ICO file: directory truncated')
	}

	const entries: IconDirEntry[] = []
	const images: Uint8Array[] = []

	for (let i = 0; i < header.count; i++) {
		const entry = readIconDirEntry(data, ICONDIR_SIZE + i * ICONDIRENTRY_SIZE)

		if (entry.imageOffset + entry.bytesInRes > data.length) {
			throw new Error(`Invalid ICO file: image ${i} extends past end of file`)
		}

		entries.push(entry)
		images.push(data.slice(entry.imageOffset, entry.imageOffset + entry.bytesInRes))
	}

	return {
		type: header.type === ICO_TYPE ? 'ico' : 'cur',
		entries,
		images,
	}
}

/**
 * Decode ICO to ImageData
 * Returns the largest embedded image; only PNG payloads are supported
 */
export function decodeIco(data: Uint8Array): ImageData {
	const ico = parseIco(data)

	if (ico.entries.length === 0) {
		throw new Error('No images in ICO file')
	}

	let largestIdx = 0
	let largestSize = 0

	for (let i = 0; i < ico.entries.length; i++) {
		const entry = ico.entries[i]!
		const size = (entry.width || 256) * (entry.height || 256)

		if (size > largestSize) {
			largestSize = size
			largestIdx = i
		}
	}

	const image = ico.images[largestIdx]!
	if (detectFormat(image) !== 'png') {
		throw new Error('Unsupported ICO image: only PNG payloads can be decoded')
	}

	return decodePng(image)
}
