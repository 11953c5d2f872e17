export { Model, defineModel } from './model.js'
export type { ModelDefinition, ColumnValues, KeyValue } from './model.js'
export { PrimaryKey, keyColumns } from './primary-key.js'
export { projection } from './projection.js'
export type { Projected } from './projection.js'
export { quoteIdentifier } from './sql.js'
