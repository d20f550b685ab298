export * from './dispatcher.js'
export * from './tools.js'
export * from './server.js'
export * from './swagger/index.js'
export * from './schemas/index.js'
