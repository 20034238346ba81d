// ─────────────────────────────────────────────────────────────
// Tensorex  ·  LaTeX Emitter
// Serialises translated expressions back to LaTeX
// ─────────────────────────────────────────────────────────────

import type { Expr, Add, Mul, Pow, Func, FuncName } from '../core/expr';
import { abs, isInteger, isNegativeNumber } from '../core/expr';
import { neg, pow } from '../core/algebra';
import { formatFloat, isNegativeTerm } from '../core/pretty';
import { GREEK_LETTERS } from '../parser/lexer';

const FUNCTIONS: Record<Exclude<FuncName, 'exp'>, string> = {
    sin: '\\sin', cos: '\\cos', tan: '\\tan',
    sinh: '\\sinh', cosh: '\\cosh', tanh: '\\tanh',
    asin: '\\arcsin', acos: '\\arccos', atan: '\\arctan',
    asinh: '\\operatorname{arsinh}', acosh: '\\operatorname{arcosh}', atanh: '\\operatorname{artanh}',
    log: '\\ln',
};

// ── Expressions ─────────────────────────────────────────────

export function toLatex(expr: Expr): string {
    switch (expr.tag) {
        case 'Rational':
            if (expr.den === 1n) return `${expr.num}`;
            return expr.num < 0n
                ? `-\\frac{${-expr.num}}{${expr.den}}`
                : `\\frac{${expr.num}}{${expr.den}}`;

        case 'Float':
            return formatFloat(expr.value);

        case 'Symbol':
            return latexName(expr.name);

        case 'Constant':
            return expr.name === 'pi' ? '\\pi' : 'e';

        case 'Add':
            return latexSum(expr);

        case 'Mul':
        case 'Pow':
            return latexProduct(expr);

        case 'Func':
            return latexFunc(expr);

        case 'Indexed': {
            let latex = latexName(expr.symbol);
            for (const { label, position } of expr.indices) {
                const text = typeof label === 'number' ? `${label}` : latexName(label);
                latex += position === 'U' ? `^{${text}}` : `_{${text}}`;
            }
            return latex;
        }

        case 'Derivative': {
            const operators = expr.wrt.map(label =>
                `\\partial_{${typeof label === 'number' ? label : latexName(label)}}`).join(' ');
            return `${operators}\\left(${toLatex(expr.expr)}\\right)`;
        }
    }
}

/** `theta` → `\theta`; `gUU01` → `\mathrm{gUU01}`; single letters stay as they are. */
export function latexName(name: string): string {
    if (GREEK_LETTERS.has(name)) return `\\${name}`;
    if (/^[a-zA-Z]$/.test(name)) return name;
    return `\\mathrm{${name}}`;
}

// ── Sums ────────────────────────────────────────────────────

function latexSum(sum: Add): string {
    return sum.terms.map((term, i) => {
        const negative = isNegativeTerm(term);
        const body = toLatex(negative ? neg(term) : term);
        if (i === 0) return negative ? `-${body}` : body;
        return negative ? ` - ${body}` : ` + ${body}`;
    }).join('');
}

// ── Products ────────────────────────────────────────────────

function latexProduct(expr: Mul | Pow): string {
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
            denominator.push(latexFactor(pow(factor.base, neg(factor.exp))));
        } else {
            numerator.push(latexFactor(factor));
        }
    }

    const top = numerator.length ? numerator.join(' ') : '1';
    if (!denominator.length) return sign + top;
    return `${sign}\\frac{${top}}{${denominator.join(' ')}}`;
}

function latexFactor(factor: Expr): string {
    if (factor.tag === 'Add') return `\\left(${toLatex(factor)}\\right)`;
    if (factor.tag === 'Pow') return latexPower(factor);
    return toLatex(factor);
}

function latexPower(power: Pow): string {
    const { base, exp } = power;
    if (exp.tag === 'Rational' && exp.num === 1n && exp.den > 1n) {
        return exp.den === 2n ? `\\sqrt{${toLatex(base)}}` : `\\sqrt[${exp.den}]{${toLatex(base)}}`;
    }
    const plainBase = base.tag === 'Symbol' || base.tag === 'Constant'
        || (isInteger(base) && base.num >= 0n);
    const b = plainBase ? toLatex(base) : `\\left(${toLatex(base)}\\right)`;
    return `${b}^{${toLatex(exp)}}`;
}

function latexFunc({ name, arg }: Func): string {
    if (name === 'exp') return `e^{${toLatex(arg)}}`;
    return `${FUNCTIONS[name]}\\left(${toLatex(arg)}\\right)`;
}

// ── Bindings ────────────────────────────────────────────────

/** An `aligned` block with one `name &= value` row per binding. */
export function bindingsToLatex(bindings: ReadonlyMap<string, Expr>): string {
    const rows = [...bindings].map(([name, value]) => `${latexName(name)} &= ${toLatex(value)}`);
    return `\\begin{aligned}\n${rows.join(' \\\\\n')}\n\\end{aligned}`;
}
