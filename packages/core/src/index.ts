export type { Color, ImageData, ImageFormat } from './types'
export { assertDimension, byteLength, createImageData } from './types'
export { detectFormat } from './format'
