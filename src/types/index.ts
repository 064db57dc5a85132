export * from './circuit'
