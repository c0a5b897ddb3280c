export * from './delimited-reader'
