import { BaseError } from "@tunesmith/errors"

export class RecordNotFoundError extends BaseError<"record_not_found"> {
  static forId(id: string): RecordNotFoundError {
    return new RecordNotFoundError(`Record "${id}" not found`, {
      code: "record_not_found",
      context: { id },
      isRetryable: false,
    })
  }
}
