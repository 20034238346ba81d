// ─────────────────────────────────────────────────────────────
// Tensorex  ·  HTML Emitter
// KaTeX rendering of expressions and binding tables
// ─────────────────────────────────────────────────────────────

import katex from 'katex';
import type { Expr } from '../core/expr';
import { bindingsToLatex, toLatex } from './latex';

export interface HtmlOptions {
    /** Block (`displayMode`) rather than inline math. */
    displayMode: boolean;
    /** Throw on LaTeX KaTeX cannot typeset instead of rendering it in red. */
    throwOnError: boolean;
}

const DEFAULT_OPTIONS: HtmlOptions = {
    displayMode: true,
    throwOnError: false,
};

export function renderHtml(value: Expr | ReadonlyMap<string, Expr>, options: Partial<HtmlOptions> = {}): string {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    const latex = 'tag' in value ? toLatex(value) : bindingsToLatex(value);
    return katex.renderToString(latex, {
        throwOnError: opts.throwOnError,
        displayMode: opts.displayMode,
    });
}
