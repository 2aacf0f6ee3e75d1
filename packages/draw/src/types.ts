/**
 * Drawing types
 */

export type { Color } from '@monogram/core'

/** Point */
export interface Point {
	x: number
	y: number
}

/** Closed outline, last point connects back to the first */
export type Polygon = readonly Point[]

/** Axis-aligned rectangle given by two corners */
export interface Rect {
	x1: number
	y1: number
	x2: number
	y2: number
}

/** Integer pixel span, end exclusive */
export interface PixelBounds {
	xStart: number
	xEnd: number
	yStart: number
	yEnd: number
}
