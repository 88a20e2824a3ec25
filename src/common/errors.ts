export class AppError extends Error {
  constructor(
    public readonly code: string,
    public readonly status: number,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class InvalidAmountError extends AppError {
  constructor(message = "Amount must be a positive number with up to two decimals") {
    super("INVALID_AMOUNT", 400, message);
  }
}

export class InvalidUserError extends AppError {
  constructor(message = "User id must be a safe integer") {
    super("INVALID_USER", 400, message);
  }
}

// Durable read/write failure; the committed ledger is left as it was.
export class StorageError extends AppError {
  constructor(message = "Ledger storage is unavailable", options?: ErrorOptions) {
    super("STORAGE_IO_ERROR", 503, message, options);
  }
}
