export type InvalidHandKind =
  | "InvalidHandLength"
  | "InvalidCard"
  | "DuplicateCard"
  | "AmbiguousHandState";

/** 手札の検証エラー。部分的な結果は返さない */
export class InvalidHandError extends Error {
  readonly kind: InvalidHandKind;

  constructor(kind: InvalidHandKind, message: string) {
    super(message);
    this.name = "InvalidHandError";
    this.kind = kind;
  }
}

export class InvalidActionError extends Error {
  readonly command: string;

  constructor(command: string, message = `unknown action: ${command}`) {
    super(message);
    this.name = "InvalidActionError";
    this.command = command;
  }
}

export type TableErrorCode = "TableNotFound" | "InvalidCommand" | "DeckExhausted";

export class TableError extends Error {
  readonly code: TableErrorCode;

  constructor(code: TableErrorCode, message: string) {
    super(message);
    this.name = "TableError";
    this.code = code;
  }
}
