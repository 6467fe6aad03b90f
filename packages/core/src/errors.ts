export class VecsyncError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** The input batch breaks its structural contract (missing key column, unknown embedding column). */
export class DataValidationError extends VecsyncError {}

/** The target table or collection does not exist for an operation that needs it. */
export class DBOperationError extends VecsyncError {
  constructor(message: string, readonly table?: string) {
    super(message)
  }
}

export function tableNotFound(table: string): DBOperationError {
  return new DBOperationError(`Table ${table} not found`, table)
}
