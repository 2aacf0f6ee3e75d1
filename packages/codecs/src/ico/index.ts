export { decodeIco, parseIco } from './decoder'
export { encodeIco } from './encoder'
export type { IcoImage, IcoSource, IconDir, IconDirEntry } from './types'
export { ICONDIRENTRY_SIZE, ICONDIR_SIZE, ICO_TYPE } from './types'
