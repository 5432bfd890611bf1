import { DecodeError, describeError } from "../errors";
import { err, ok, type Result } from "../utils/result";

/**
 * Strict UTF-8 decode; a leading BOM is dropped.
 */
export function decodePlainText(bytes: Buffer): Result<string, DecodeError> {
  try {
    const decoder = new TextDecoder("utf-8", { fatal: true });
    return ok(decoder.decode(bytes));
  } catch (error) {
    return err(
      new DecodeError(`File is not valid UTF-8 text: ${describeError(error)}`, {
        cause: error,
      })
    );
  }
}
