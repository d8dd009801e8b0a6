export * from './src'
