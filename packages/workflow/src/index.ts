export * from './types.js'
export * from './typeIdentifier.js'
export * from './shapes.js'
export * from './extractor.js'
export * from './helper.js'
export * from './analysis.js'
export * from './structure.js'
export * from './writeBack.js'
export * from './projectFile.js'
