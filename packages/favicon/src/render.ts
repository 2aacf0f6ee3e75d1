import { type Color, type ImageData, assertDimension } from '@monogram/core'
import { createImage, fillPolygon, fillRect, scalePoints, scaleRect } from '@monogram/draw'
import { BACKGROUND, DESIGN_GRID, FOREGROUND, type Layer, MONOGRAM_LAYERS, type Paint } from './glyphs'

function colorFor(paint: Paint): Color {
	return paint === 'foreground' ? FOREGROUND : BACKGROUND
}

/**
 * Paint layers in order, scaled from the design grid to the image size
 */
export function paintLayers(image: ImageData, layers: readonly Layer[]): void {
	const scale = image.width / DESIGN_GRID

	for (const layer of layers) {
		const color = colorFor(layer.paint)
		if (layer.kind === 'polygon') {
			fillPolygon(image, scalePoints(layer.points, scale), color)
		} else {
			fillRect(image, scaleRect(layer.rect, scale), color)
		}
	}
}

/**
 * Render the monogram into a new size x size image
 */
export function renderMonogram(size: number): ImageData {
	assertDimension('size', size)

	const image = createImage(size, size, BACKGROUND)
	paintLayers(image, MONOGRAM_LAYERS)
	return image
}
