// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Public API
// LaTeX → symbolic expressions with Einstein summation
// ─────────────────────────────────────────────────────────────

import type { Expr } from './core/expr';
import { LatexError } from './parser/errors';
import { LatexParser } from './parser/parser';
import type { ParseResult } from './parser/parser';
import { Session } from './engine/session';
import type { SessionOptions } from './engine/session';

export type ExprResult =
    | { ok: true; expr: Expr }
    | { ok: false; error: LatexError };

export function createSession(options: Partial<SessionOptions> = {}): Session {
    return new Session(options);
}

/**
 * Translates `sentence` (assignments, `align` environments and `%`
 * directives) in `session`. Bindings made before an error stay in the
 * session; with `continueOnError` the failing structure is skipped.
 */
export function parse(sentence: string, session: Session = createSession()): ParseResult {
    return new LatexParser(session, session.options.continueOnError).run(sentence);
}

/** Translates a single expression without binding anything. */
export function parseExpr(sentence: string, session: Session = createSession()): ExprResult {
    try {
        return { ok: true, expr: new LatexParser(session).parseExpression(sentence) };
    } catch (error) {
        if (error instanceof LatexError) return { ok: false, error };
        throw error;
    }
}

export { prettyExpr as toString, prettyBindings } from './core/pretty';
export { toLatex, bindingsToLatex } from './emitters/latex';
export { renderHtml } from './emitters/html';
export type { HtmlOptions } from './emitters/html';
export { LatexError, LexError, ParseError, TensorError, formatDiagnostic } from './parser/errors';
export type { ErrorKind } from './parser/errors';
export { Session } from './engine/session';
export type { Logger, SessionOptions, TensorDecl, Symmetry, MetricContext, Diacritic, DerivativeMode } from './engine/session';
export type { ParseResult } from './parser/parser';
export type { Expr, Index, IndexLabel, Position, FuncName } from './core/expr';
export { tokenize } from './parser/lexer';
export type { Token, TokenKind } from './parser/lexer';
