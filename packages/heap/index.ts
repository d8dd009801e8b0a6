/**
 * heappack heap
 *
 * Graph codec over JavaScript heap values
 */

export * from './src/code-table'
export * from './src/heap-graph-codec'
export {
  GRAPH_MAGIC,
  NodeTag,
} from './src/layout'
export * from './src/values'
