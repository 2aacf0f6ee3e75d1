/**
 * "AP" monogram geometry on a 512-unit design grid (y grows downward)
 */

import type { Color } from '@monogram/core'
import { type Point, type Polygon, type Rect, arcPoints } from '@monogram/draw'

export const DESIGN_GRID = 512

export const BACKGROUND: Color = [0x2e, 0x4e, 0x8a, 255]
export const FOREGROUND: Color = [255, 255, 255, 255]

export type Paint = 'foreground' | 'background'

/** One paint operation, applied in array order */
export type Layer =
	| { kind: 'polygon'; name: string; points: Polygon; paint: Paint }
	| { kind: 'rect'; name: string; rect: Rect; paint: Paint }

const pts = (...coords: [number, number][]): Point[] => coords.map(([x, y]) => ({ x, y }))

export const A_OUTER: Polygon = pts(
	[130, 404],
	[210, 100],
	[226, 100],
	[306, 404],
	[258, 404],
	[232, 302],
	[182, 302],
	[156, 404]
)

export const A_HOLE: Polygon = pts([214, 180], [242, 288], [190, 288])

export const A_BAR: Rect = { x1: 180, y1: 250, x2: 252, y2: 292 }

// Stem, then the bowl as a half-ellipse closing back into the stem
export const P_OUTER: Polygon = [
	...pts([316, 404], [316, 116], [372, 116]),
	...arcPoints(390, 196, 96, 88, -90, 90, 48),
	...pts([362, 284], [362, 404], [316, 404]),
]

export const P_HOLE: Polygon = [
	...pts([336, 164], [372, 164]),
	...arcPoints(384, 194, 70, 62, -90, 90, 40),
	...pts([372, 226], [336, 226]),
]

/**
 * Paint order: each counter after its letter, the bar after the A's counter
 */
export const MONOGRAM_LAYERS: readonly Layer[] = [
	{ kind: 'polygon', name: 'A outer', points: A_OUTER, paint: 'foreground' },
	{ kind: 'polygon', name: 'A hole', points: A_HOLE, paint: 'background' },
	{ kind: 'rect', name: 'A bar', rect: A_BAR, paint: 'foreground' },
	{ kind: 'polygon', name: 'P outer', points: P_OUTER, paint: 'foreground' },
	{ kind: 'polygon', name: 'P hole', points: P_HOLE, paint: 'background' },
]
