export type FilterOperator = 'eq' | 'gte' | 'lte'

export type FilterValue = string | number | boolean

export interface QueryFilter {
  readonly column: string
  readonly op: FilterOperator
  readonly value: FilterValue
}

/** A structurally valid query, defaults applied. */
export interface DatasetQuery {
  readonly filters: readonly QueryFilter[]
  /** `null` or empty selects every column in descriptor order. */
  readonly columns: readonly string[] | null
  readonly limit: number
  readonly offset: number
  readonly debug: boolean
}

/** What callers may pass; everything is optional and decoded before use. */
export interface DatasetQueryInput {
  readonly filters?: readonly QueryFilter[] | undefined
  readonly columns?: readonly string[] | null | undefined
  readonly limit?: number | undefined
  readonly offset?: number | undefined
  readonly debug?: boolean | undefined
}

export interface ValidatedQuery {
  readonly columns: readonly string[]
  readonly filters: readonly QueryFilter[]
}
