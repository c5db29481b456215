/**
 * Type exports
 *
 * @module types
 */

export type {
  EventRecord,
  EventTable,
  Shard,
  IsoMap,
  SchemaOptions,
  ConsolidateOptions,
  ConsolidateResult,
} from './table'
