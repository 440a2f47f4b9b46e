export * from './constants.js'
export * from './math/util.js'
export * from './types/runtime.js'
export * from './types/sheet.js'
