// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Symbolic Differentiation
// ─────────────────────────────────────────────────────────────

import { ZERO, ONE, MINUS_ONE, mk, isZero } from './expr';
import type { Expr, Func, Sym, Indexed, Derivative } from './expr';
import { add, mul, pow, neg, sub, func, derivative } from './algebra';

/** Decides the derivative of an atom the chain rule cannot look inside. */
export type LeafRule = (leaf: Sym | Indexed | Derivative) => Expr;

const MINUS_HALF = mk.rational(-1, 2);

// ── Chain-rule table ────────────────────────────────────────

function outerDerivative(f: Func): Expr {
    const u = f.arg;
    const square = pow(u, mk.int(2));
    switch (f.name) {
        case 'sin': return func('cos', u);
        case 'cos': return neg(func('sin', u));
        case 'tan': return add(ONE, pow(f, mk.int(2)));
        case 'sinh': return func('cosh', u);
        case 'cosh': return func('sinh', u);
        case 'tanh': return sub(ONE, pow(f, mk.int(2)));
        case 'asin': return pow(sub(ONE, square), MINUS_HALF);
        case 'acos': return neg(pow(sub(ONE, square), MINUS_HALF));
        case 'atan': return pow(add(ONE, square), MINUS_ONE);
        case 'asinh': return pow(add(square, ONE), MINUS_HALF);
        case 'acosh': return pow(sub(square, ONE), MINUS_HALF);
        case 'atanh': return pow(sub(ONE, square), MINUS_ONE);
        case 'exp': return f;
        case 'log': return pow(u, MINUS_ONE);
    }
}

// ── Differentiation ─────────────────────────────────────────

export function differentiate(expr: Expr, leaf: LeafRule): Expr {
    const d = (e: Expr): Expr => differentiate(e, leaf);
    switch (expr.tag) {
        case 'Rational':
        case 'Float':
        case 'Constant':
            return ZERO;

        case 'Symbol':
        case 'Indexed':
        case 'Derivative':
            return leaf(expr);

        case 'Add':
            return add(...expr.terms.map(d));

        case 'Mul':
            return add(...expr.factors.map((factor, i) =>
                mul(d(factor), ...expr.factors.filter((_, j) => j !== i))));

        case 'Pow': {
            const base = d(expr.base);
            const exp = d(expr.exp);
            if (isZero(exp)) return mul(expr.exp, pow(expr.base, sub(expr.exp, ONE)), base);
            return mul(expr, add(
                mul(exp, func('log', expr.base)),
                mul(expr.exp, base, pow(expr.base, MINUS_ONE)),
            ));
        }

        case 'Func': {
            const inner = d(expr.arg);
            if (isZero(inner)) return ZERO;
            return mul(outerDerivative(expr), inner);
        }
    }
}

/** Ordinary derivative with respect to the symbol `name`. */
export function diff(expr: Expr, name: string): Expr {
    return differentiate(expr, atom => {
        if (atom.tag === 'Symbol') return atom.name === name ? ONE : ZERO;
        return derivative(atom, [name]);
    });
}
