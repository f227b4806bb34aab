/**
 * cratedoc rustdoc model
 * Typed access to the item graph of rustdoc JSON documents
 */

export * from './types.js'
export * from './kinds.js'
export * from './parser.js'
export * from './loader.js'
