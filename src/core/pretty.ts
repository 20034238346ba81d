// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Pretty-Printer for Expressions
// ─────────────────────────────────────────────────────────────

import type { Expr, Add, Mul, Pow } from './expr';
import { abs, isNegativeNumber, isInteger } from './expr';
import { neg, pow } from './algebra';

// ── Pretty-print an expression in plain text ────────────────

export function prettyExpr(expr: Expr): string {
    switch (expr.tag) {
        case 'Rational':
            return expr.den === 1n ? `${expr.num}` : `${expr.num}/${expr.den}`;

        case 'Float':
            return formatFloat(expr.value);

        case 'Symbol':
        case 'Constant':
            return expr.name;

        case 'Add':
            return prettySum(expr);

        case 'Mul':
        case 'Pow':
            return prettyProduct(expr);

        case 'Func':
            return `${expr.name}(${prettyExpr(expr.arg)})`;

        case 'Indexed':
            return expr.symbol + expr.indices.map(i => `[${i.label}]`).join('');

        case 'Derivative':
            return `∂(${prettyExpr(expr.expr)}, ${expr.wrt.join(', ')})`;
    }
}

export function formatFloat(value: number): string {
    return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

// ── Sums ────────────────────────────────────────────────────

/** True for a negative number or a product led by one. */
export function isNegativeTerm(term: Expr): boolean {
    if (term.tag === 'Mul') return isNegativeNumber(term.factors[0]);
    return isNegativeNumber(term);
}

function prettySum(sum: Add): string {
    return sum.terms.map((term, i) => {
        const negative = isNegativeTerm(term);
        const body = prettyExpr(negative ? neg(term) : term);
        if (i === 0) return negative ? `-${body}` : body;
        return negative ? ` - ${body}` : ` + ${body}`;
    }).join('');
}

// ── Products and powers ─────────────────────────────────────

function prettyProduct(expr: Mul | Pow): string {
    const factors = expr.tag === 'Mul' ? expr.factors : [expr];
    let sign = '';
    const numerator: string[] = [];
    const denominator: string[] = [];

    for (const factor of factors) {
        if (factor.tag === 'Rational') {
            if (factor.num < 0n) sign = '-';
            const magnitude = abs(factor.num);
            if (magnitude !== 1n) numerator.push(`${magnitude}`);
            if (factor.den !== 1n) denominator.push(`${factor.den}`);
        } else if (factor.tag === 'Float') {
            if (factor.value < 0) sign = '-';
            numerator.push(formatFloat(Math.abs(factor.value)));
        } else if (factor.tag === 'Pow' && isNegativeNumber(factor.exp)) {
            denominator.push(prettyFactor(pow(factor.base, neg(factor.exp))));
        } else {
            numerator.push(prettyFactor(factor));
        }
    }

    const top = numerator.length ? numerator.join('*') : '1';
    if (!denominator.length) return sign + top;
    const bottom = denominator.length === 1 ? denominator[0] : `(${denominator.join('*')})`;
    return `${sign}${top}/${bottom}`;
}

function prettyFactor(factor: Expr): string {
    if (factor.tag === 'Add' || factor.tag === 'Mul') return `(${prettyExpr(factor)})`;
    if (factor.tag === 'Pow') return prettyPower(factor);
    return prettyExpr(factor);
}

function prettyPower(power: Pow): string {
    const { base, exp } = power;
    const plainBase = base.tag === 'Symbol' || base.tag === 'Constant' || base.tag === 'Func'
        || base.tag === 'Indexed' || (isInteger(base) && base.num >= 0n);
    const plainExp = exp.tag === 'Symbol' || exp.tag === 'Constant' || (isInteger(exp) && exp.num >= 0n);
    const b = plainBase ? prettyExpr(base) : `(${prettyExpr(base)})`;
    const e = plainExp ? prettyExpr(exp) : `(${prettyExpr(exp)})`;
    return `${b}^${e}`;
}

// ── Bindings ────────────────────────────────────────────────

/** One `name = value` line per binding, in insertion order. */
export function prettyBindings(bindings: ReadonlyMap<string, Expr>): string {
    return [...bindings].map(([name, value]) => `${name} = ${prettyExpr(value)}`).join('\n');
}
