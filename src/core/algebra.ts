// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Canonical Algebra
// Smart constructors that keep every Expr in canonical form
// ─────────────────────────────────────────────────────────────

import {
    mk, ZERO, ONE, MINUS_ONE, keyOf, compareKeys, abs,
    isNumber, isZero, isOne, isInteger, numericValue,
} from './expr';
import type { Expr, FuncName, IndexLabel, NumberExpr, Rational } from './expr';

// ── Numeric arithmetic ──────────────────────────────────────

function addNumbers(a: NumberExpr, b: NumberExpr): NumberExpr {
    if (a.tag === 'Rational' && b.tag === 'Rational') {
        return mk.rational(a.num * b.den + b.num * a.den, a.den * b.den);
    }
    return mk.float(numericValue(a) + numericValue(b));
}

function multiplyNumbers(a: NumberExpr, b: NumberExpr): NumberExpr {
    if (a.tag === 'Rational' && b.tag === 'Rational') {
        return mk.rational(a.num * b.num, a.den * b.den);
    }
    return mk.float(numericValue(a) * numericValue(b));
}

/** Largest exponent evaluated exactly; beyond it a numeric power stays symbolic. */
const EXACT_EXPONENT_LIMIT = 10000n;

/** The integer `degree`-th root of `n >= 0`, or `null` when it is not exact. */
function exactRoot(n: bigint, degree: bigint): bigint | null {
    let low = 0n;
    let high = 1n;
    while (high ** degree < n) high *= 2n;
    while (low <= high) {
        const mid = (low + high) / 2n;
        const value = mid ** degree;
        if (value === n) return mid;
        if (value < n) low = mid + 1n;
        else high = mid - 1n;
    }
    return null;
}

/** Evaluates `base^exp` when the result is representable, else `null`. */
function powerOfNumbers(base: NumberExpr, exp: NumberExpr): NumberExpr | null {
    if (base.tag === 'Float' || exp.tag === 'Float') {
        const value = Math.pow(numericValue(base), numericValue(exp));
        return Number.isFinite(value) ? mk.float(value) : null;
    }
    if (base.num === 0n) return exp.num > 0n ? ZERO : null;
    if (exp.den === 1n) {
        const n = abs(exp.num);
        if (n > EXACT_EXPONENT_LIMIT) return null;
        const num = base.num ** n;
        const den = base.den ** n;
        return exp.num >= 0n ? mk.rational(num, den) : mk.rational(den, num);
    }
    if (base.num < 0n || exp.den > EXACT_EXPONENT_LIMIT) return null;
    const num = exactRoot(base.num, exp.den);
    const den = exactRoot(base.den, exp.den);
    if (num === null || den === null) return null;
    return powerOfNumbers(mk.rational(num, den), mk.int(exp.num));
}

// ── Sums ────────────────────────────────────────────────────

function splitCoefficient(term: Expr): [NumberExpr, Expr] {
    if (term.tag === 'Mul') {
        const [first, ...rest] = term.factors;
        if (isNumber(first)) return [first, rest.length === 1 ? rest[0] : { tag: 'Mul', factors: rest }];
    }
    return [ONE, term];
}

function withCoefficient(coefficient: NumberExpr, rest: Expr): Expr {
    if (isOne(coefficient)) return rest;
    if (rest.tag === 'Mul') return { tag: 'Mul', factors: [coefficient, ...rest.factors] };
    return { tag: 'Mul', factors: [coefficient, rest] };
}

export function add(...terms: Expr[]): Expr {
    let constant: NumberExpr = ZERO;
    const buckets = new Map<string, { coefficient: NumberExpr; rest: Expr }>();

    const visit = (term: Expr): void => {
        if (term.tag === 'Add') {
            term.terms.forEach(visit);
            return;
        }
        if (isNumber(term)) {
            constant = addNumbers(constant, term);
            return;
        }
        const [coefficient, rest] = splitCoefficient(term);
        const key = keyOf(rest);
        const bucket = buckets.get(key);
        if (bucket) bucket.coefficient = addNumbers(bucket.coefficient, coefficient);
        else buckets.set(key, { coefficient, rest });
    };
    terms.forEach(visit);

    const out: Expr[] = [];
    if (!isZero(constant)) out.push(constant);
    const sorted = [...buckets.entries()].sort(([a], [b]) => compareKeys(a, b));
    for (const [, { coefficient, rest }] of sorted) {
        if (!isZero(coefficient)) out.push(withCoefficient(coefficient, rest));
    }

    if (out.length === 0) return constant;
    if (out.length === 1) return out[0];
    return { tag: 'Add', terms: out };
}

// ── Products ────────────────────────────────────────────────

export function mul(...factors: Expr[]): Expr {
    let coefficient: NumberExpr = ONE;
    const groups = new Map<string, { base: Expr; exp: Expr }>();

    const visit = (factor: Expr): void => {
        if (factor.tag === 'Mul') {
            factor.factors.forEach(visit);
            return;
        }
        if (isNumber(factor)) {
            coefficient = multiplyNumbers(coefficient, factor);
            return;
        }
        const base = factor.tag === 'Pow' ? factor.base : factor;
        const exp = factor.tag === 'Pow' ? factor.exp : ONE;
        const key = keyOf(base);
        const group = groups.get(key);
        if (group) group.exp = add(group.exp, exp);
        else groups.set(key, { base, exp });
    };
    factors.forEach(visit);

    if (isZero(coefficient)) return coefficient;

    const powers: Expr[] = [];
    let regroup = false;
    const sorted = [...groups.entries()].sort(([a], [b]) => compareKeys(a, b));
    for (const [, { base, exp }] of sorted) {
        const power = pow(base, exp);
        if (isNumber(power)) coefficient = multiplyNumbers(coefficient, power);
        else {
            if (power.tag === 'Mul') regroup = true;
            powers.push(power);
        }
    }
    if (regroup) return mul(coefficient, ...powers);

    if (powers.length === 0) return coefficient;
    if (isOne(coefficient)) return powers.length === 1 ? powers[0] : { tag: 'Mul', factors: powers };
    return { tag: 'Mul', factors: [coefficient, ...powers] };
}

// ── Powers ──────────────────────────────────────────────────

export function pow(base: Expr, exp: Expr): Expr {
    if (isZero(exp) && exp.tag === 'Rational') return ONE;
    if (isOne(exp)) return base;
    if (isNumber(base) && isNumber(exp)) {
        const value = powerOfNumbers(base, exp);
        if (value) return value;
    }
    if (isOne(base)) return ONE;
    if (base.tag === 'Constant' && base.name === 'e') return func('exp', exp);
    if (base.tag === 'Pow' && isInteger(exp)) return pow(base.base, mul(base.exp, exp));
    if (base.tag === 'Mul' && isInteger(exp)) return mul(...base.factors.map(f => pow(f, exp)));
    return { tag: 'Pow', base, exp };
}

export function neg(expr: Expr): Expr {
    return mul(MINUS_ONE, expr);
}

export function sub(a: Expr, b: Expr): Expr {
    return add(a, neg(b));
}

export function div(a: Expr, b: Expr): Expr {
    return mul(a, pow(b, MINUS_ONE));
}

// ── Functions ───────────────────────────────────────────────

const VANISHING_AT_ZERO = new Set<FuncName>(['sin', 'tan', 'sinh', 'tanh', 'asin', 'atan', 'asinh', 'atanh']);

export function func(name: FuncName, arg: Expr): Expr {
    if (isZero(arg) && arg.tag === 'Rational') {
        if (VANISHING_AT_ZERO.has(name)) return ZERO;
        if (name === 'cos' || name === 'cosh' || name === 'exp') return ONE;
    }
    if (name === 'exp' && isOne(arg)) return mk.e();
    if (name === 'log') {
        if (isOne(arg)) return ZERO;
        if (arg.tag === 'Constant' && arg.name === 'e') return ONE;
    }
    return { tag: 'Func', name, arg };
}

// ── Derivatives ─────────────────────────────────────────────

/** A pending derivative; nested derivatives merge into one node. */
export function derivative(expr: Expr, wrt: readonly IndexLabel[]): Expr {
    if (wrt.length === 0) return expr;
    if (isNumber(expr) || expr.tag === 'Constant') return ZERO;
    if (expr.tag === 'Derivative') return { tag: 'Derivative', expr: expr.expr, wrt: [...expr.wrt, ...wrt] };
    return { tag: 'Derivative', expr, wrt };
}

// ── Rebuilding ──────────────────────────────────────────────

/**
 * Rebuilds `expr` bottom-up through the smart constructors. `leaf`
 * may replace any node before its children are visited.
 */
export function transform(expr: Expr, leaf: (node: Expr) => Expr | undefined): Expr {
    const replaced = leaf(expr);
    if (replaced !== undefined) return replaced;
    const recur = (child: Expr): Expr => transform(child, leaf);
    switch (expr.tag) {
        case 'Add': return add(...expr.terms.map(recur));
        case 'Mul': return mul(...expr.factors.map(recur));
        case 'Pow': return pow(recur(expr.base), recur(expr.exp));
        case 'Func': return func(expr.name, recur(expr.arg));
        case 'Derivative': return derivative(recur(expr.expr), expr.wrt);
        default: return expr;
    }
}

// ── Expansion ───────────────────────────────────────────────

function distribute(a: Expr, b: Expr): Expr {
    const left = a.tag === 'Add' ? a.terms : [a];
    const right = b.tag === 'Add' ? b.terms : [b];
    return add(...left.flatMap(l => right.map(r => mul(l, r))));
}

function isPositiveInteger(expr: Expr): expr is Rational {
    return isInteger(expr) && expr.num > 0n;
}

/** Distributes products over sums and multiplies out positive integer powers of sums. */
export function expand(expr: Expr): Expr {
    switch (expr.tag) {
        case 'Add':
            return add(...expr.terms.map(expand));
        case 'Mul':
            return expr.factors.map(expand).reduce(distribute, ONE);
        case 'Pow': {
            const base = expand(expr.base);
            const exp = expand(expr.exp);
            if (isPositiveInteger(exp)) {
                if (base.tag === 'Add') {
                    let product: Expr = ONE;
                    for (let i = 0n; i < exp.num; i++) product = distribute(product, base);
                    return product;
                }
                if (base.tag === 'Mul') return expand(mul(...base.factors.map(f => pow(f, exp))));
            }
            return pow(base, exp);
        }
        case 'Func':
            return func(expr.name, expand(expr.arg));
        case 'Derivative': {
            const inner = expand(expr.expr);
            if (inner.tag === 'Add') return add(...inner.terms.map(t => derivative(t, expr.wrt)));
            return derivative(inner, expr.wrt);
        }
        default:
            return expr;
    }
}

/** Additive terms of the expanded expression; an exact zero has none. */
export function termsOf(expr: Expr): readonly Expr[] {
    const expanded = expand(expr);
    if (isZero(expanded) && expanded.tag === 'Rational') return [];
    return expanded.tag === 'Add' ? expanded.terms : [expanded];
}
