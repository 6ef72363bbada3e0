/**
 * Lexical analysis of caller-supplied T-SQL read statements.
 *
 * The lexer only needs to tell keywords apart from literals, quoted
 * identifiers and comments, and to know the parenthesis depth of every
 * token; it is not a parser.
 */

import type { SqlParams, SqlValue } from "../db/types.js";

export type TokenKind = "word" | "number" | "string" | "quoted" | "variable" | "system-variable" | "punct";

export interface SqlToken {
  kind: TokenKind;
  text: string;
  /** Uppercased text, for keyword comparison. */
  upper: string;
  start: number;
  end: number;
  /** Parenthesis depth; '(' and ')' carry the depth outside their group. */
  depth: number;
}

export class SqlLexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SqlLexError";
  }
}

const WORD_START = /[\p{L}_#]/u;
const WORD_PART = /[\p{L}\p{N}_#$]/u;
const DIGIT = /[0-9]/;

export function lexSql(text: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  let depth = 0;
  let i = 0;

  const push = (kind: TokenKind, start: number, end: number, tokenDepth = depth) => {
    const slice = text.slice(start, end);
    tokens.push({ kind, text: slice, upper: slice.toUpperCase(), start, end, depth: tokenDepth });
  };

  const readDelimited = (start: number, open: number, close: string, what: string): number => {
    let j = open;
    while (j < text.length) {
      if (text[j] === close) {
        if (text[j + 1] === close) {
          j += 2;
          continue;
        }
        return j + 1;
      }
      j++;
    }
    throw new SqlLexError(`Unterminated ${what} starting at position ${start}`);
  };

  while (i < text.length) {
    const c = text[i];
    const next = text[i + 1];

    if (/\s/.test(c)) {
      i++;
      continue;
    }

    if (c === "-" && next === "-") {
      const newline = text.indexOf("\n", i);
      i = newline === -1 ? text.length : newline + 1;
      continue;
    }

    if (c === "/" && next === "*") {
      // T-SQL block comments nest
      let nesting = 1;
      let j = i + 2;
      while (j < text.length && nesting > 0) {
        if (text[j] === "/" && text[j + 1] === "*") {
          nesting++;
          j += 2;
        } else if (text[j] === "*" && text[j + 1] === "/") {
          nesting--;
          j += 2;
        } else {
          j++;
        }
      }
      if (nesting > 0) {
        throw new SqlLexError(`Unterminated block comment starting at position ${i}`);
      }
      i = j;
      continue;
    }

    if (c === "'") {
      const end = readDelimited(i, i + 1, "'", "string literal");
      push("string", i, end);
      i = end;
      continue;
    }

    if ((c === "N" || c === "n") && next === "'") {
      const end = readDelimited(i, i + 2, "'", "string literal");
      push("string", i, end);
      i = end;
      continue;
    }

    if (c === "[") {
      const end = readDelimited(i, i + 1, "]", "bracketed identifier");
      push("quoted", i, end);
      i = end;
      continue;
    }

    if (c === '"') {
      const end = readDelimited(i, i + 1, '"', "quoted identifier");
      push("quoted", i, end);
      i = end;
      continue;
    }

    if (c === "@") {
      const system = next === "@";
      let j = i + (system ? 2 : 1);
      while (j < text.length && WORD_PART.test(text[j])) {
        j++;
      }
      push(system ? "system-variable" : "variable", i, j);
      i = j;
      continue;
    }

    if (DIGIT.test(c) || (c === "." && next !== undefined && DIGIT.test(next))) {
      let j = i;
      if (c === "0" && (next === "x" || next === "X")) {
        j += 2;
        while (j < text.length && /[0-9a-fA-F]/.test(text[j])) j++;
      } else {
        while (j < text.length && /[0-9.]/.test(text[j])) j++;
        if ((text[j] === "e" || text[j] === "E") && /[-+0-9]/.test(text[j + 1] ?? "")) {
          j += 2;
          while (j < text.length && DIGIT.test(text[j])) j++;
        }
      }
      push("number", i, j);
      i = j;
      continue;
    }

    if (WORD_START.test(c)) {
      let j = i + 1;
      while (j < text.length && WORD_PART.test(text[j])) {
        j++;
      }
      push("word", i, j);
      i = j;
      continue;
    }

    if (c === "(") {
      push("punct", i, i + 1, depth);
      depth++;
      i++;
      continue;
    }

    if (c === ")") {
      depth = Math.max(0, depth - 1);
      push("punct", i, i + 1, depth);
      i++;
      continue;
    }

    push("punct", i, i + 1);
    i++;
  }

  return tokens;
}

const FORBIDDEN_KEYWORDS = new Set([
  "DELETE", "DROP", "UPDATE", "INSERT", "ALTER", "CREATE",
  "TRUNCATE", "EXEC", "EXECUTE", "MERGE", "GRANT", "REVOKE", "DENY",
  "COMMIT", "ROLLBACK", "TRANSACTION", "BEGIN", "DECLARE", "SET", "USE",
  "BACKUP", "RESTORE", "KILL", "SHUTDOWN", "WAITFOR", "OPENROWSET",
  "OPENDATASOURCE", "OPENQUERY", "OPENXML", "BULK", "INTO", "DBCC", "RECONFIGURE",
]);

const SET_OPERATORS = new Set(["UNION", "EXCEPT", "INTERSECT"]);

export const ROW_LIMIT_PARAM = "__row_limit";

export interface ReadStatementOptions {
  limit: number;
  maxQueryLength: number;
  rejectInlineLiterals: boolean;
}

export type LimitStrategy = "caller" | "top-injected" | "top-replaced" | "fetch-capped" | "fetch-appended" | "wrapped";

export type ReadStatementAnalysis =
  | {
      ok: true;
      statement: string;
      params: SqlParams;
      leadingKeyword: "SELECT" | "WITH";
      limit: number;
      strategy: LimitStrategy;
    }
  | { ok: false; reason: string };

interface Edit {
  start: number;
  end: number;
  text: string;
}

function applyEdits(text: string, edits: Edit[]): string {
  return [...edits]
    .sort((a, b) => b.start - a.start)
    .reduce((acc, edit) => acc.slice(0, edit.start) + edit.text + acc.slice(edit.end), text);
}

function isWord(token: SqlToken | undefined, ...words: string[]): boolean {
  return token?.kind === "word" && words.includes(token.upper);
}

function isPunct(token: SqlToken | undefined, char: string): boolean {
  return token?.kind === "punct" && token.text === char;
}

/** Index of the ')' closing the group opened at `open`. */
function closingParen(tokens: SqlToken[], open: number): number {
  for (let j = open + 1; j < tokens.length; j++) {
    if (isPunct(tokens[j], ")") && tokens[j].depth === tokens[open].depth) {
      return j;
    }
  }
  return tokens.length - 1;
}

/**
 * Reads a TOP / FETCH argument: a bare number or a parenthesised group.
 * Returns the index of its last token and the integer it holds, if it is one.
 */
function readCountArgument(tokens: SqlToken[], index: number): { last: number; value: number | null } | null {
  const token = tokens[index];
  if (token?.kind === "number") {
    return { last: index, value: /^\d+$/.test(token.text) ? Number(token.text) : null };
  }
  if (isPunct(token, "(")) {
    const close = closingParen(tokens, index);
    const inner = tokens.slice(index + 1, close);
    const value = inner.length === 1 && inner[0].kind === "number" && /^\d+$/.test(inner[0].text) ? Number(inner[0].text) : null;
    return { last: close, value };
  }
  return null;
}

function findTopLevel(tokens: SqlToken[], from: number, ...words: string[]): number {
  for (let j = from; j < tokens.length; j++) {
    if (tokens[j].depth === 0 && isWord(tokens[j], ...words)) {
      return j;
    }
  }
  return -1;
}

function paramNameSet(params: SqlParams): Set<string> {
  return new Set(Object.keys(params).map((name) => name.toLowerCase()));
}

/**
 * Validates a caller-supplied read statement and rewrites it so that it can
 * never return more than `limit` rows (plus one probe row used to detect
 * truncation). The limit travels as the bound parameter @__row_limit.
 */
export function analyzeReadStatement(
  query: string,
  params: SqlParams,
  options: ReadStatementOptions
): ReadStatementAnalysis {
  if (query.length > options.maxQueryLength) {
    return { ok: false, reason: `Query is too long. Maximum allowed length is ${options.maxQueryLength} characters.` };
  }

  let tokens: SqlToken[];
  try {
    tokens = lexSql(query);
  } catch (error) {
    if (error instanceof SqlLexError) {
      return { ok: false, reason: error.message };
    }
    throw error;
  }

  while (tokens.length > 0 && isPunct(tokens[tokens.length - 1], ";")) {
    tokens = tokens.slice(0, -1);
  }
  if (tokens.length === 0) {
    return { ok: false, reason: "Query cannot be empty after removing comments" };
  }
  if (tokens.some((token) => isPunct(token, ";"))) {
    return { ok: false, reason: "Multiple SQL statements are not allowed. Use only a single SELECT statement." };
  }

  const leading = tokens[0];
  if (!isWord(leading, "SELECT", "WITH")) {
    return { ok: false, reason: `Only read statements are allowed; the query starts with '${leading.text}'.` };
  }

  for (const token of tokens) {
    if (token.kind === "word" && FORBIDDEN_KEYWORDS.has(token.upper)) {
      return { ok: false, reason: `Keyword '${token.upper}' is not allowed. Only SELECT operations are permitted.` };
    }
    if (token.kind === "word" && /^(SP|XP)_/.test(token.upper)) {
      return { ok: false, reason: `Procedure reference '${token.text}' is not allowed.` };
    }
    if (token.kind === "system-variable") {
      return { ok: false, reason: `System variable '${token.text}' is not allowed.` };
    }
    if (token.kind === "string" && options.rejectInlineLiterals) {
      return {
        ok: false,
        reason: "Inline string literals are not allowed. Pass values in 'params' and reference them as @name.",
      };
    }
  }

  const supplied = paramNameSet(params);
  for (const token of tokens.filter((candidate) => candidate.kind === "variable")) {
    const name = token.text.slice(1);
    if (name.startsWith("__")) {
      return { ok: false, reason: `Parameter name '${token.text}' is reserved.` };
    }
    if (!supplied.has(name.toLowerCase())) {
      return { ok: false, reason: `Parameter '${token.text}' is referenced but not supplied in 'params'.` };
    }
  }

  const base = query.slice(0, tokens[tokens.length - 1].end);
  const leadingKeyword = leading.upper === "WITH" ? "WITH" : "SELECT";
  const mainSelect = leadingKeyword === "SELECT" ? 0 : findTopLevel(tokens, 1, "SELECT");
  if (mainSelect < 0) {
    return { ok: false, reason: "A WITH clause must be followed by a SELECT statement." };
  }

  const stacked = tokens.findIndex(
    (token, index) =>
      index > mainSelect &&
      token.depth === 0 &&
      isWord(token, "SELECT") &&
      !isWord(tokens[index - 1], ...SET_OPERATORS) &&
      !(isWord(tokens[index - 1], "ALL") && isWord(tokens[index - 2], ...SET_OPERATORS))
  );
  if (stacked >= 0) {
    return { ok: false, reason: "Multiple SQL statements are not allowed. Use only a single SELECT statement." };
  }

  const limit = options.limit;
  const limitRef = `(@${ROW_LIMIT_PARAM})`;
  const bounded = (statement: string, strategy: LimitStrategy): ReadStatementAnalysis => ({
    ok: true,
    statement,
    params: strategy === "caller" ? { ...params } : { ...params, [ROW_LIMIT_PARAM]: limit + 1 },
    leadingKeyword,
    limit,
    strategy,
  });

  // Trailing FOR XML/JSON and OPTION(...) clauses must stay last.
  const forClause = tokens.findIndex(
    (token, index) => index > mainSelect && token.depth === 0 && isWord(token, "FOR") && isWord(tokens[index + 1], "XML", "JSON", "BROWSE")
  );
  const tail = [forClause, findTopLevel(tokens, mainSelect + 1, "OPTION")]
    .filter((index) => index >= 0)
    .map((index) => tokens[index].start);
  const appendAt = tail.length > 0 ? Math.min(...tail) : base.length;

  const hasSetOperator = tokens.some((token, index) => index > mainSelect && token.depth === 0 && isWord(token, ...SET_OPERATORS));
  const orderBy = tokens.findIndex(
    (token, index) => index > mainSelect && token.depth === 0 && isWord(token, "ORDER") && isWord(tokens[index + 1], "BY")
  );
  const offset = findTopLevel(tokens, mainSelect + 1, "OFFSET");
  const fetch = findTopLevel(tokens, mainSelect + 1, "FETCH");

  if (fetch >= 0 && isWord(tokens[fetch + 1], "NEXT", "FIRST")) {
    const argument = readCountArgument(tokens, fetch + 2);
    if (!argument) {
      return { ok: false, reason: "Could not read the FETCH row count." };
    }
    if (argument.value !== null && argument.value <= limit) {
      return bounded(base, "caller");
    }
    const edit = { start: tokens[fetch + 2].start, end: tokens[argument.last].end, text: limitRef };
    return bounded(applyEdits(base, [edit]), "fetch-capped");
  }

  if (orderBy >= 0 && (hasSetOperator || offset >= 0)) {
    const clause = offset >= 0 ? `FETCH NEXT ${limitRef} ROWS ONLY` : `OFFSET 0 ROWS FETCH NEXT ${limitRef} ROWS ONLY`;
    return bounded(applyEdits(base, [{ start: appendAt, end: appendAt, text: `\n${clause}\n` }]), "fetch-appended");
  }

  const wrapped = (): ReadStatementAnalysis => {
    const start = tokens[mainSelect].start;
    const statement =
      base.slice(0, start) +
      `SELECT TOP ${limitRef} * FROM (\n` +
      base.slice(start, appendAt) +
      "\n) AS __bounded_result\n" +
      base.slice(appendAt);
    return bounded(statement, "wrapped");
  };

  if (hasSetOperator) {
    return wrapped();
  }

  let cursor = mainSelect + 1;
  if (isWord(tokens[cursor], "ALL", "DISTINCT")) {
    cursor++;
  }

  if (isWord(tokens[cursor], "TOP")) {
    const argument = readCountArgument(tokens, cursor + 1);
    if (!argument) {
      return { ok: false, reason: "Could not read the TOP row count." };
    }
    const percent = isWord(tokens[argument.last + 1], "PERCENT");
    const last = percent ? argument.last + 1 : argument.last;
    // WITH TIES can return more rows than the TOP count
    if (isWord(tokens[last + 1], "WITH") && isWord(tokens[last + 2], "TIES")) {
      return wrapped();
    }
    if (!percent && argument.value !== null && argument.value <= limit) {
      return bounded(base, "caller");
    }
    const edit = { start: tokens[cursor].start, end: tokens[last].end, text: `TOP ${limitRef}` };
    return bounded(applyEdits(base, [edit]), "top-replaced");
  }

  const anchor = tokens[cursor - 1];
  return bounded(applyEdits(base, [{ start: anchor.end, end: anchor.end, text: ` TOP ${limitRef}` }]), "top-injected");
}

export function isScalarParam(value: unknown): value is SqlValue {
  return value === null || ["string", "number", "boolean"].includes(typeof value);
}
