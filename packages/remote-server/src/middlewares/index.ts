export * from './validate.js'
