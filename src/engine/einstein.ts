// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Einstein Summation Engine
// Index balance, implicit sums and component equations
// ─────────────────────────────────────────────────────────────

import { containsIndexed } from '../core/expr';
import type { Expr, Index, IndexLabel, Position } from '../core/expr';
import { add, neg, termsOf, transform } from '../core/algebra';
import { diff } from '../core/calculus';
import { ParseError, TensorError } from '../parser/errors';
import type { Session, TensorDecl } from './session';
import { canonicalize, componentName, indexPattern, lookupComponent } from './tensor';

/** Left-hand side of an equation: a tensor symbol and its index list. */
export interface Target {
    symbol: string;
    indices: readonly Index[];
}

type Environment = ReadonlyMap<string, number>;

interface FreeIndex {
    label: string;
    position: Position;
}

// ── Index balance ───────────────────────────────────────────

interface BalanceRecord {
    upper: number;
    lower: number;
}

function countIndices(session: Session, expr: Expr, multiplicity: number, record: Map<string, BalanceRecord>): void {
    const tally = (label: IndexLabel, position: Position): void => {
        if (typeof label !== 'string') return;
        const entry = record.get(label) ?? { upper: 0, lower: 0 };
        if (position === 'U') entry.upper += multiplicity;
        else entry.lower += multiplicity;
        record.set(label, entry);
    };

    switch (expr.tag) {
        case 'Indexed':
            for (const { label, position } of expr.indices) tally(label, position);
            return;
        case 'Derivative':
            countIndices(session, expr.expr, multiplicity, record);
            for (const label of expr.wrt) {
                if (typeof label === 'string' && !session.isCoordinate(label)) tally(label, 'D');
            }
            return;
        case 'Pow':
            if (expr.exp.tag === 'Rational' && expr.exp.den === 1n && expr.exp.num > 0n) {
                countIndices(session, expr.base, multiplicity * Number(expr.exp.num), record);
                return;
            }
            countIndices(session, expr.base, multiplicity, record);
            countIndices(session, expr.exp, multiplicity, record);
            return;
        case 'Add':
        case 'Mul':
        case 'Func':
            for (const child of expr.tag === 'Add' ? expr.terms : expr.tag === 'Mul' ? expr.factors : [expr.arg]) {
                countIndices(session, child, multiplicity, record);
            }
            return;
        default:
            return;
    }
}

const freeKey = ({ label, position }: FreeIndex): string => `${position}:${label}`;

/**
 * Validates one additive term against the free indices of the LHS and
 * returns its bound labels. A label occurring twice must occur once
 * upper and once lower; the remaining labels must match the LHS.
 */
export function balance(session: Session, term: Expr, free: readonly FreeIndex[]): string[] {
    const record = new Map<string, BalanceRecord>();
    countIndices(session, term, 1, record);

    const bound: string[] = [];
    const termFree: FreeIndex[] = [];
    for (const [label, { upper, lower }] of record) {
        if (upper + lower > 1) {
            if (upper !== 1 || lower !== 1) throw new TensorError(`illegal bound index '${label}'`);
            bound.push(label);
        } else {
            termFree.push({ label, position: upper ? 'U' : 'D' });
        }
    }

    const expected = new Set(free.map(freeKey));
    const found = new Set(termFree.map(freeKey));
    for (const key of [...expected, ...found]) {
        if (!expected.has(key) || !found.has(key)) {
            throw new TensorError(`unbalanced free index '${key.slice(2)}'`);
        }
    }
    return bound;
}

// ── Resolution ──────────────────────────────────────────────

function coordinate(session: Session, value: number): string {
    if (session.basis.length === 0) throw new ParseError('cannot differentiate symbolically without basis');
    const name = session.basis[value];
    if (name === undefined) throw new TensorError(`no basis coordinate for index ${value}`);
    return name;
}

function labelValue(label: string, env: Environment): number {
    const value = env.get(label);
    if (value === undefined) throw new TensorError(`unbalanced free index '${label}'`);
    return value;
}

/** Substitutes component values for indexed atoms and evaluates pending derivatives. */
export function resolve(session: Session, expr: Expr, env: Environment): Expr {
    return transform(expr, node => {
        if (node.tag === 'Indexed') {
            const values = node.indices.map(({ label }) => typeof label === 'number' ? label : labelValue(label, env));
            return lookupComponent(session, node.symbol, values);
        }
        if (node.tag === 'Derivative') {
            let value = resolve(session, node.expr, env);
            for (const label of node.wrt) {
                const index = typeof label === 'number' ? label : env.get(label);
                value = diff(value, index === undefined ? String(label) : coordinate(session, index));
            }
            return value;
        }
        return undefined;
    });
}

function* assignments(session: Session, labels: readonly string[], env: Environment): Generator<Environment> {
    if (labels.length === 0) {
        yield env;
        return;
    }
    const [label, ...rest] = labels;
    const { start, stop } = session.rangeOf(label);
    for (let value = start; value < stop; value++) {
        yield* assignments(session, rest, new Map([...env, [label, value]]));
    }
}

function sumBound(session: Session, term: Expr, bound: readonly string[], env: Environment): Expr {
    const values: Expr[] = [];
    for (const assignment of assignments(session, bound, env)) values.push(resolve(session, term, assignment));
    return add(...values);
}

// ── Equations ───────────────────────────────────────────────

function freeIndices(target: Target): FreeIndex[] {
    const free: FreeIndex[] = [];
    const seen = new Set<string>();
    for (const { label, position } of target.indices) {
        if (typeof label !== 'string') continue;
        if (seen.has(label)) throw new TensorError(`illegal bound index '${label}'`);
        seen.add(label);
        free.push({ label, position });
    }
    return free;
}

/** Component values of `rhs` for every assignment of the LHS free labels. */
function componentEquations(session: Session, rhs: Expr, free: readonly FreeIndex[]): (env: Environment) => Expr {
    if (free.length === 0 && !containsIndexed(rhs)) {
        return env => resolve(session, rhs, env);
    }
    const terms = termsOf(rhs);
    const bounds = terms.map(term => balance(session, term, free));
    return env => add(...terms.map((term, i) => sumBound(session, term, bounds[i], env)));
}

/**
 * Expands `target = rhs` into one component equation per assignment
 * of the free labels, row-major in LHS order, and binds the results.
 * Undeclared tensors on the LHS are declared with the session dimension.
 */
export function assign(session: Session, target: Target, rhs: Expr, bindings: Map<string, Expr>): void {
    if (target.indices.length === 0) {
        const value = componentEquations(session, rhs, [])(new Map());
        session.bind(target.symbol, value, bindings);
        return;
    }

    const free = freeIndices(target);
    const decl: TensorDecl = session.tensors.get(target.symbol) ?? {
        symbol: target.symbol,
        pattern: indexPattern(target.symbol),
        dimension: session.requireDimension(),
        symmetry: { kind: 'none' },
    };
    if (decl.pattern.length !== target.indices.length) {
        throw new TensorError(`inconsistent rank for tensor '${target.symbol}'`);
    }
    const equation = componentEquations(session, rhs, free);
    // every component reads the values from before this equation
    const computed = new Map<string, Expr>();
    for (const env of assignments(session, free.map(f => f.label), new Map())) {
        const indices = target.indices.map(({ label }) => typeof label === 'number' ? label : labelValue(label, env));
        const name = componentName(decl.symbol, indices);
        let value: Expr | undefined;
        if (decl.symmetry.kind === 'pairs') {
            const canonical = canonicalize(indices, decl.symmetry.pairs);
            const known = computed.get(componentName(decl.symbol, canonical.indices));
            if (known !== undefined && canonical.sign === 1) value = known;
            else if (known !== undefined && canonical.sign === -1) value = neg(known);
        }
        value ??= equation(env);
        computed.set(name, value);
    }
    session.tensors.set(decl.symbol, decl);
    for (const [name, value] of computed) session.bind(name, value, bindings);
}

/** Evaluates a standalone expression; it may not carry free indices. */
export function evaluate(session: Session, expr: Expr): Expr {
    return componentEquations(session, expr, [])(new Map());
}
