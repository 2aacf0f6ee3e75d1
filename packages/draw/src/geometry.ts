/**
 * Shape construction helpers
 */

import type { Point, Polygon, Rect } from './types'

/**
 * Sample an elliptical arc between two angles (degrees).
 *
 * Yields `steps + 1` points, both endpoints included. The returned iterable
 * starts over each time it is iterated.
 */
export function arcPoints(
	cx: number,
	cy: number,
	rx: number,
	ry: number,
	startDeg: number,
	endDeg: number,
	steps = 48
): Iterable<Point> {
	const start = (startDeg * Math.PI) / 180
	const end = (endDeg * Math.PI) / 180
	const count = Math.max(2, steps)

	return {
		*[Symbol.iterator]() {
			for (let i = 0; i <= count; i++) {
				const t = start + ((end - start) * i) / count
				yield { x: cx + Math.cos(t) * rx, y: cy + Math.sin(t) * ry }
			}
		},
	}
}

/**
 * Scale every point about the origin
 */
export function scalePoints(points: Polygon, scale: number): Point[] {
	return points.map((p) => ({ x: p.x * scale, y: p.y * scale }))
}

/**
 * Scale a rectangle about the origin
 */
export function scaleRect(rect: Rect, scale: number): Rect {
	return {
		x1: rect.x1 * scale,
		y1: rect.y1 * scale,
		x2: rect.x2 * scale,
		y2: rect.y2 * scale,
	}
}

/**
 * Bounding box of a polygon
 */
export function polygonBounds(points: Polygon): Rect {
	let x1 = Number.POSITIVE_INFINITY
	let y1 = Number.POSITIVE_INFINITY
	let x2 = Number.NEGATIVE_INFINITY
	let y2 = Number.NEGATIVE_INFINITY

	for (const p of points) {
		x1 = Math.min(x1, p.x)
		y1 = Math.min(y1, p.y)
		x2 = Math.max(x2, p.x)
		y2 = Math.max(y2, p.y)
	}

	return { x1, y1, x2, y2 }
}
