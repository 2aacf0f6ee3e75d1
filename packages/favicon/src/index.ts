export {
	type FaviconAsset,
	FAVICON_SIZES,
	ICO_FILE_NAME,
	buildFaviconAssets,
	formatSummary,
	pngFileName,
	writeFaviconAssets,
} from './assets'
export {
	A_BAR,
	A_HOLE,
	A_OUTER,
	BACKGROUND,
	DESIGN_GRID,
	FOREGROUND,
	type Layer,
	MONOGRAM_LAYERS,
	P_HOLE,
	P_OUTER,
	type Paint,
} from './glyphs'
export { paintLayers, renderMonogram } from './render'
