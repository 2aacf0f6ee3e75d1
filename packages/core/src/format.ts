import type { ImageFormat } from './types'

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES: Record<ImageFormat, readonly number[]> = {
	png: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a],
	ico: [0x00, 0x00, 0x01, 0x00],
}

/**
 * Check if bytes start with a magic signature
 */
function matchMagic(data: Uint8Array, magic: readonly number[]): boolean {
	if (data.length < magic.length) return false

	for (let i = 0; i < magic.length; i++) {
		if (data[i] !== magic[i]) return false
	}
	return true
}

/**
 * Detect format from binary data
 */
export function detectFormat(data: Uint8Array): ImageFormat | null {
	if (matchMagic(data, MAGIC_BYTES.png)) return 'png'
	if (matchMagic(data, MAGIC_BYTES.ico)) return 'ico'
	return null
}
