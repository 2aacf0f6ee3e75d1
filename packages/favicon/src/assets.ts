import { mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { encodeIco, encodePng } from '@monogram/codecs'
import type { ImageFormat } from '@monogram/core'
import { renderMonogram } from './render'

/** PNG sizes written, smallest first; the ICO wraps the smallest */
export const FAVICON_SIZES = [32, 192, 512] as const

export const ICO_FILE_NAME = 'favicon.ico'

export interface FaviconAsset {
	fileName: string
	format: ImageFormat
	/** Pixel width and height */
	size: number
	data: Uint8Array
}

export function pngFileName(size: number): string {
	return `favicon-${size}x${size}.png`
}

/**
 * Render and encode every asset in memory
 */
export function buildFaviconAssets(): FaviconAsset[] {
	const pngs = FAVICON_SIZES.map((size): FaviconAsset => ({
		fileName: pngFileName(size),
		format: 'png',
		size,
		data: encodePng(renderMonogram(size)),
	}))

	const smallest = pngs[0]!
	const ico: FaviconAsset = {
		fileName: ICO_FILE_NAME,
		format: 'ico',
		size: smallest.size,
		data: encodeIco([{ width: smallest.size, height: smallest.size, png: smallest.data }]),
	}

	return [...pngs, ico]
}

/**
 * Write every asset into outDir, creating it if needed
 */
export function writeFaviconAssets(outDir: string): FaviconAsset[] {
	mkdirSync(outDir, { recursive: true })

	const assets = buildFaviconAssets()
	for (const asset of assets) {
		writeFileSync(join(outDir, asset.fileName), asset.data)
	}
	return assets
}

/**
 * Human-readable report: one line per PNG with its byte size
 */
export function formatSummary(assets: readonly FaviconAsset[]): string {
	const lines = ['Generated favicon assets:']
	for (const asset of assets) {
		if (asset.format !== 'png') continue
		lines.push(`  ${asset.size}x${asset.size} -> ${asset.data.length} bytes`)
	}
	return lines.join('\n')
}
