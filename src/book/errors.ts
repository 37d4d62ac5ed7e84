export type BookErrorCode =
  | "decode_size_mismatch"
  | "account_not_found"
  | "malformed_update"
  | "corrupt_tree"
  | "side_mismatch";

export class BookError extends Error {
  readonly code: BookErrorCode;

  constructor(code: BookErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class DecodeSizeMismatch extends BookError {
  readonly actual: number;
  readonly expected: number;

  constructor(actual: number, expected: number) {
    super(
      "decode_size_mismatch",
      `book side data length (${actual}) does not match expected size (${expected})`
    );
    this.actual = actual;
    this.expected = expected;
  }
}

export class AccountNotFound extends BookError {
  readonly address: string;

  constructor(address: string) {
    super("account_not_found", `account_not_found: ${address}`);
    this.address = address;
  }
}

/**
 * A live notification whose payload failed to decode. The watcher keeps its
 * previous snapshot when this happens.
 */
export class MalformedUpdate extends BookError {
  readonly address: string;

  constructor(address: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("malformed_update", `malformed_update: ${address}: ${reason}`, { cause });
    this.address = address;
  }
}

export class CorruptTree extends BookError {
  readonly index: number | null;

  constructor(reason: string, index: number | null = null) {
    super("corrupt_tree", index == null ? `corrupt_tree: ${reason}` : `corrupt_tree: ${reason} at node ${index}`);
    this.index = index;
  }
}

export class SideMismatch extends BookError {
  constructor(expected: string, actual: string) {
    super("side_mismatch", `side_mismatch: expected ${expected} but account holds ${actual}`);
  }
}

export function isBookError(e: unknown): e is BookError {
  return e instanceof BookError;
}
