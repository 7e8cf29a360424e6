export interface FieldError {
  path: string;
  message: string;
}

export type RankingErrorCode =
  | "INVALID_ARGUMENT"
  | "EMPTY_RANKING"
  | "CONCURRENT_MODIFICATION"
  | "RANKING_DISPOSED"
  | "DISPOSAL_FAILED";

export interface Problem {
  type: string;
  title: string;
  code: RankingErrorCode;
  detail?: string;
  errors?: FieldError[];
}

export function problem(params: { code: RankingErrorCode; detail?: string; errors?: FieldError[] }): Problem {
  const type = `urn:bounded-ranking:${params.code.toLowerCase().replace(/_/g, "-")}`;
  return {
    type,
    title: codeToTitle(params.code),
    code: params.code,
    detail: params.detail,
    errors: params.errors,
  };
}

function codeToTitle(code: RankingErrorCode): string {
  switch (code) {
    case "INVALID_ARGUMENT":
      return "Invalid argument";
    case "EMPTY_RANKING":
      return "Ranking is empty";
    case "CONCURRENT_MODIFICATION":
      return "Ranking modified during iteration";
    case "RANKING_DISPOSED":
      return "Ranking disposed";
    case "DISPOSAL_FAILED":
      return "Disposal failed";
  }
}

/** Error thrown by every ranking operation. Carries the problem fields for callers that branch on `code`. */
export class RankingError extends Error {
  readonly type: string;
  readonly title: string;
  readonly code: RankingErrorCode;
  readonly detail?: string;
  readonly errors?: FieldError[];

  constructor(params: { code: RankingErrorCode; detail?: string; errors?: FieldError[] }, options?: { cause?: unknown }) {
    const p = problem(params);
    super(p.detail ? `${p.title}: ${p.detail}` : p.title, options);
    this.name = "RankingError";
    this.type = p.type;
    this.title = p.title;
    this.code = p.code;
    this.detail = p.detail;
    this.errors = p.errors;
  }

  toProblem(): Problem {
    return { type: this.type, title: this.title, code: this.code, detail: this.detail, errors: this.errors };
  }
}
