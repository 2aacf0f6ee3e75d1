/**
 * ICO format types and constants
 */

export const ICO_TYPE = 1
export const CUR_TYPE = 2

export const ICONDIR_SIZE = 6
export const ICONDIRENTRY_SIZE = 16

/**
 * ICONDIR header structure
 */
export interface IconDir {
	reserved: number // Must be 0
	type: number // 1 for ICO, 2 for CUR
	count: number // Number of images
}

/**
 * ICONDIRENTRY structure
 */
export interface IconDirEntry {
	width: number // 0 means 256 or larger
	height: number // 0 means 256 or larger
	colorCount: number
	reserved: number
	planes: number
	bitCount: number
	bytesInRes: number // Size of image data
	imageOffset: number // Absolute offset of image data
}

/**
 * Already-encoded PNG to embed, with its pixel dimensions
 */
export interface IcoSource {
	width: number
	height: number
	png: Uint8Array
}

/**
 * Parsed ICO file
 */
export interface IcoImage {
	type: 'ico' | 'cur'
	entries: IconDirEntry[]
	images: Uint8Array[] // Embedded image bytes, one per entry
}
