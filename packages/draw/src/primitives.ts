/**
 * Drawing primitives
 *
 * Fills overwrite pixels outright, there is no blending or anti-aliasing.
 * Coordinates are in pixels; anything outside the image is clipped.
 */

import { type Color, type ImageData, createImageData } from '@monogram/core'
import { polygonBounds } from './geometry'
import type { PixelBounds, Polygon, Rect } from './types'

// Added to the edge height in the crossing division
const EDGE_EPSILON = 1e-12

function clamp(value: number, lower: number, upper: number): number {
	return Math.max(lower, Math.min(upper, value))
}

/**
 * Create a new image filled with a color
 */
export function createImage(width: number, height: number, color: Color = [0, 0, 0, 0]): ImageData {
	return createImageData(width, height, color)
}

/**
 * Set a pixel color
 */
export function setPixel(image: ImageData, x: number, y: number, color: Color): void {
	if (x < 0 || x >= image.width || y < 0 || y >= image.height) return

	const idx = (Math.floor(y) * image.width + Math.floor(x)) * 4
	image.data[idx] = color[0]
	image.data[idx + 1] = color[1]
	image.data[idx + 2] = color[2]
	image.data[idx + 3] = color[3]
}

/**
 * Get a pixel color
 */
export function getPixel(image: ImageData, x: number, y: number): Color {
	if (x < 0 || x >= image.width || y < 0 || y >= image.height) {
		return [0, 0, 0, 0]
	}

	const idx = (Math.floor(y) * image.width + Math.floor(x)) * 4
	return [image.data[idx]!, image.data[idx + 1]!, image.data[idx + 2]!, image.data[idx + 3]!]
}

/**
 * Even-odd point in polygon test (ray cast towards +x)
 */
export function pointInPolygon(x: number, y: number, polygon: Polygon): boolean {
	let inside = false
	const n = polygon.length

	for (let i = 0; i < n; i++) {
		const p1 = polygon[i]!
		const p2 = polygon[(i + 1) % n]!

		if (p1.y > y !== p2.y > y) {
			const xIntersect = ((p2.x - p1.x) * (y - p1.y)) / (p2.y - p1.y + EDGE_EPSILON) + p1.x
			if (x < xIntersect) {
				inside = !inside
			}
		}
	}

	return inside
}

/**
 * Pixel span covered by a polygon's bounding box, rounded outward and clipped
 */
export function polygonPixelBounds(image: ImageData, polygon: Polygon): PixelBounds {
	const box = polygonBounds(polygon)
	return {
		xStart: clamp(Math.floor(box.x1), 0, image.width),
		xEnd: clamp(Math.ceil(box.x2), 0, image.width),
		yStart: clamp(Math.floor(box.y1), 0, image.height),
		yEnd: clamp(Math.ceil(box.y2), 0, image.height),
	}
}

/**
 * Pixel span covered by a rectangle.
 *
 * An empty span is widened to one pixel at its start before clipping, so a
 * hairline stroke still paints one row or column.
 */
export function rectPixelBounds(image: ImageData, rect: Rect): PixelBounds {
	const xStart = Math.floor(rect.x1)
	const yStart = Math.floor(rect.y1)
	let xEnd = Math.ceil(rect.x2)
	let yEnd = Math.ceil(rect.y2)

	if (xEnd <= xStart) xEnd = xStart + 1
	if (yEnd <= yStart) yEnd = yStart + 1

	return {
		xStart: clamp(xStart, 0, image.width),
		xEnd: clamp(xEnd, 0, image.width),
		yStart: clamp(yStart, 0, image.height),
		yEnd: clamp(yEnd, 0, image.height),
	}
}

/**
 * Fill a polygon with the even-odd rule, sampling pixel centers
 */
export function fillPolygon(image: ImageData, polygon: Polygon, color: Color): void {
	if (polygon.length === 0) return

	const { xStart, xEnd, yStart, yEnd } = polygonPixelBounds(image, polygon)
	if (xEnd <= xStart || yEnd <= yStart) return

	for (let y = yStart; y < yEnd; y++) {
		const cy = y + 0.5
		for (let x = xStart; x < xEnd; x++) {
			if (pointInPolygon(x + 0.5, cy, polygon)) {
				setPixel(image, x, y, color)
			}
		}
	}
}

/**
 * Fill a rectangle
 */
export function fillRect(image: ImageData, rect: Rect, color: Color): void {
	const { xStart, xEnd, yStart, yEnd } = rectPixelBounds(image, rect)

	for (let y = yStart; y < yEnd; y++) {
		for (let x = xStart; x < xEnd; x++) {
			setPixel(image, x, y, color)
		}
	}
}
