export type ErrorClassification = 'input' | 'capacity' | 'integrity';

/** 所有 pathfrac domain 錯誤的基底類別 */
export abstract class PathFracError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Input ---

/** 文字形式的路徑含有非法 component */
export class PathParseError extends PathFracError {
  readonly classification = 'input' as const;
  readonly code = 'PATH_PARSE';

  constructor(
    public readonly component: string,
    public readonly index: number,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid path component "${component}" at position ${index}: ${reason}`, options);
  }
}

/** 程式介面傳入的路徑元素不是非負整數 */
export class InvalidPathElementError extends PathFracError {
  readonly classification = 'input' as const;
  readonly code = 'INVALID_ELEMENT';

  constructor(
    public readonly element: unknown,
    options?: ErrorOptions,
  ) {
    super(`Path element must be a non-negative integer, got ${String(element)}`, options);
  }
}

export class PathNotFoundError extends PathFracError {
  readonly classification = 'input' as const;
  readonly code = 'PATH_NOT_FOUND';

  constructor(
    public readonly label: string,
    options?: ErrorOptions,
  ) {
    super(`No stored path with label "${label}"`, options);
  }
}

export class InvalidLabelError extends PathFracError {
  readonly classification = 'input' as const;
  readonly code = 'INVALID_LABEL';

  constructor(
    public readonly label: string,
    options?: ErrorOptions,
  ) {
    super(`Label must be a non-empty string without surrounding whitespace, got "${label}"`, options);
  }
}

// --- Capacity ---

/** 64-bit 運算溢位；不允許 wraparound */
export class PathOverflowError extends PathFracError {
  readonly classification = 'capacity' as const;
  readonly code = 'PATH_OVERFLOW';
}

// --- Integrity ---

/** 由原始數值重建的 identifier 不是合法 encoder 輸出 */
export class MalformedPathIdentifierError extends PathFracError {
  readonly classification = 'integrity' as const;
  readonly code = 'MALFORMED_IDENTIFIER';
}
