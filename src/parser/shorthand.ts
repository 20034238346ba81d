// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Comma / Semicolon Derivative Shorthand
// ─────────────────────────────────────────────────────────────

const SHORTHAND = /\)_\{([,;])([a-zA-Z]+)\}/;

function openingParen(sentence: string, close: number): number {
    let depth = 0;
    for (let i = close; i >= 0; i--) {
        if (sentence[i] === ')') depth++;
        else if (sentence[i] === '(') depth--;
        if (depth === 0) return i;
    }
    return -1;
}

/**
 * Rewrites `(expr)_{,ab}` into `\partial_a \partial_b (expr)` and
 * `(expr)_{;ab}` into `\nabla_a \nabla_b (expr)`. Each letter after the
 * comma or semicolon is one derivative index.
 */
export function expandShorthand(sentence: string): string {
    let result = sentence;
    for (let found = SHORTHAND.exec(result); found; found = SHORTHAND.exec(result)) {
        const close = found.index;
        const open = openingParen(result, close);
        if (open < 0) return result;
        const operator = found[1] === ',' ? '\\partial' : '\\nabla';
        const prefix = [...found[2]].map(label => `${operator}_${label} `).join('');
        result = result.slice(0, open) + prefix + result.slice(open, close + 1)
            + result.slice(close + found[0].length);
    }
    return result;
}
