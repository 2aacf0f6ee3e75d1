#!/usr/bin/env node
/**
 * Favicon generator CLI
 *
 * Renders the monogram and writes the PNG and ICO assets into ./images.
 * Takes no arguments.
 */

import { resolve } from 'node:path'
import { formatSummary, writeFaviconAssets } from '@monogram/favicon'

const OUTPUT_DIR = 'images'

function main(): void {
	const outDir = resolve(process.cwd(), OUTPUT_DIR)
	const assets = writeFaviconAssets(outDir)
	console.log(formatSummary(assets))
}

try {
	main()
} catch (err) {
	console.error('Fatal error:', err)
	process.exit(1)
}
