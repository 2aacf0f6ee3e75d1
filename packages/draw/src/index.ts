export type { Color, PixelBounds, Point, Polygon, Rect } from './types'
export { arcPoints, polygonBounds, scalePoints, scaleRect } from './geometry'
export {
	createImage,
	fillPolygon,
	fillRect,
	getPixel,
	pointInPolygon,
	polygonPixelBounds,
	rectPixelBounds,
	setPixel,
} from './primitives'
