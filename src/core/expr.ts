// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Symbolic Expression Tree
// The immutable IR every LaTeX sentence is translated into
// ─────────────────────────────────────────────────────────────

// ── Expressions ─────────────────────────────────────────────

export type Expr =
    | Rational
    | Float
    | Sym
    | Constant
    | Add
    | Mul
    | Pow
    | Func
    | Indexed
    | Derivative;

/** Exact number; integers carry `den === 1n`. Always reduced, `den > 0n`. */
export interface Rational {
    tag: 'Rational';
    num: bigint;
    den: bigint;
}

export interface Float {
    tag: 'Float';
    value: number;
}

export interface Sym {
    tag: 'Symbol';
    name: string;
}

export interface Constant {
    tag: 'Constant';
    name: 'pi' | 'e';
}

/** Sum of at least two terms; a numeric term, if any, comes first. */
export interface Add {
    tag: 'Add';
    terms: readonly Expr[];
}

/** Product of factors; a numeric coefficient, if any, comes first. */
export interface Mul {
    tag: 'Mul';
    factors: readonly Expr[];
}

export interface Pow {
    tag: 'Pow';
    base: Expr;
    exp: Expr;
}

export type FuncName =
    | 'sin' | 'cos' | 'tan'
    | 'sinh' | 'cosh' | 'tanh'
    | 'asin' | 'acos' | 'atan'
    | 'asinh' | 'acosh' | 'atanh'
    | 'exp' | 'log';

export interface Func {
    tag: 'Func';
    name: FuncName;
    arg: Expr;
}

// ── Pre-expansion forms ─────────────────────────────────────
// Only live while an equation is being translated; component
// expansion replaces them with namespace values.

export type Position = 'U' | 'D';

/** An index label (`'mu'`) or a concrete component (`2`). */
export type IndexLabel = string | number;

export interface Index {
    label: IndexLabel;
    position: Position;
}

export interface Indexed {
    tag: 'Indexed';
    symbol: string;
    indices: readonly Index[];
}

/** Pending partial derivative; `wrt` holds labels, coordinates or component numbers. */
export interface Derivative {
    tag: 'Derivative';
    expr: Expr;
    wrt: readonly IndexLabel[];
}

// ── Helper constructors ─────────────────────────────────────

export function abs(n: bigint): bigint {
    return n < 0n ? -n : n;
}

function gcd(a: bigint, b: bigint): bigint {
    a = abs(a);
    b = abs(b);
    while (b) [a, b] = [b, a % b];
    return a;
}

export const mk = {
    int: (n: number | bigint): Rational => ({ tag: 'Rational', num: BigInt(n), den: 1n }),

    rational: (num: number | bigint, den: number | bigint): Rational => {
        const n = BigInt(num);
        const d = BigInt(den);
        if (d === 0n) throw new RangeError('zero denominator');
        const g = gcd(n, d) || 1n;
        const sign = d < 0n ? -1n : 1n;
        return { tag: 'Rational', num: (sign * n) / g, den: (sign * d) / g };
    },

    float: (value: number): Float => ({ tag: 'Float', value }),
    sym: (name: string): Sym => ({ tag: 'Symbol', name }),
    pi: (): Constant => ({ tag: 'Constant', name: 'pi' }),
    e: (): Constant => ({ tag: 'Constant', name: 'e' }),

    indexed: (symbol: string, indices: readonly Index[]): Indexed => ({
        tag: 'Indexed', symbol, indices,
    }),
};

export const ZERO = mk.int(0);
export const ONE = mk.int(1);
export const MINUS_ONE = mk.int(-1);

// ── Predicates ──────────────────────────────────────────────

export type NumberExpr = Rational | Float;

export function isNumber(expr: Expr): expr is NumberExpr {
    return expr.tag === 'Rational' || expr.tag === 'Float';
}

export function isZero(expr: Expr): boolean {
    return (expr.tag === 'Rational' && expr.num === 0n) || (expr.tag === 'Float' && expr.value === 0);
}

export function isOne(expr: Expr): boolean {
    return expr.tag === 'Rational' && expr.num === 1n && expr.den === 1n;
}

export function isInteger(expr: Expr): expr is Rational {
    return expr.tag === 'Rational' && expr.den === 1n;
}

export function isNegativeNumber(expr: Expr): boolean {
    return (expr.tag === 'Rational' && expr.num < 0n) || (expr.tag === 'Float' && expr.value < 0);
}

export function numericValue(expr: NumberExpr): number {
    return expr.tag === 'Float' ? expr.value : Number(expr.num) / Number(expr.den);
}

// ── Structural keys ─────────────────────────────────────────
// Two canonical expressions are equal exactly when their keys are.

const KEYS = new WeakMap<Expr, string>();

export function keyOf(expr: Expr): string {
    const cached = KEYS.get(expr);
    if (cached !== undefined) return cached;
    const key = computeKey(expr);
    KEYS.set(expr, key);
    return key;
}

function computeKey(expr: Expr): string {
    switch (expr.tag) {
        case 'Rational': return expr.den === 1n ? `${expr.num}` : `${expr.num}/${expr.den}`;
        case 'Float': return `~${expr.value}`;
        case 'Symbol': return expr.name;
        case 'Constant': return `#${expr.name}`;
        case 'Add': return `+(${expr.terms.map(keyOf).join(',')})`;
        case 'Mul': return `*(${expr.factors.map(keyOf).join(',')})`;
        case 'Pow': return `^(${keyOf(expr.base)},${keyOf(expr.exp)})`;
        case 'Func': return `${expr.name}(${keyOf(expr.arg)})`;
        case 'Indexed':
            return `${expr.symbol}[${expr.indices.map(i => `${i.position}${i.label}`).join(',')}]`;
        case 'Derivative': return `d(${keyOf(expr.expr)};${expr.wrt.join(',')})`;
    }
}

export function compareKeys(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

export function equals(a: Expr, b: Expr): boolean {
    return a === b || keyOf(a) === keyOf(b);
}

// ── Traversal ───────────────────────────────────────────────

export function children(expr: Expr): readonly Expr[] {
    switch (expr.tag) {
        case 'Add': return expr.terms;
        case 'Mul': return expr.factors;
        case 'Pow': return [expr.base, expr.exp];
        case 'Func': return [expr.arg];
        case 'Derivative': return [expr.expr];
        default: return [];
    }
}

export function some(expr: Expr, predicate: (node: Expr) => boolean): boolean {
    return predicate(expr) || children(expr).some(child => some(child, predicate));
}

export function containsIndexed(expr: Expr): boolean {
    return some(expr, node => node.tag === 'Indexed');
}
