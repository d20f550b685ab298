export * from './property.js'
export * from './snapshot.js'
