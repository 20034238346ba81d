// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Tensor Declarations
// Index patterns, symmetry metadata and component generation
// ─────────────────────────────────────────────────────────────

import { mk, ZERO, ONE } from '../core/expr';
import type { Expr, Position } from '../core/expr';
import { neg } from '../core/algebra';
import { TensorError } from '../parser/errors';
import type { Session, Symmetry, SymmetryPair, TensorDecl } from './session';

// ── Naming ──────────────────────────────────────────────────

/**
 * Index positions encoded in a tensor symbol: the trailing run of
 * `U`/`D` letters of every `_`-separated segment, where the first
 * character of the name always belongs to the base.
 *
 *     indexPattern('hUD')       → ['U', 'D']
 *     indexPattern('vU_dD')     → ['U', 'D']
 *     indexPattern('gDD_dDD')   → ['D', 'D', 'D', 'D']
 */
export function indexPattern(symbol: string): Position[] {
    const pattern: Position[] = [];
    symbol.split('_').forEach((segment, i) => {
        const body = i === 0 ? segment.slice(1) : segment;
        const run = /[UD]*$/.exec(body)?.[0] ?? '';
        for (const letter of run) pattern.push(letter === 'U' ? 'U' : 'D');
    });
    return pattern;
}

/** The symbol with its index suffix removed (`'ghatDD'` → `'ghat'`). */
export function baseOf(symbol: string): string {
    const head = symbol.split('_')[0];
    return head.slice(0, head.length - indexPattern(head).length);
}

export function componentName(symbol: string, indices: readonly number[]): string {
    return symbol + indices.join('');
}

/** Name of the tensor holding one more partial derivative of `symbol`. */
export function derivativeSymbol(symbol: string): string {
    return symbol + (symbol.includes('_d') ? '' : '_d') + 'D';
}

// ── Symmetry ────────────────────────────────────────────────

/**
 * Parses `sym01`, `anti12` and combinations such as `sym01_anti23`.
 * Three or more digits relate every adjacent pair.
 */
export function parseSymmetry(keyword: string, symbol: string, rank: number): Symmetry {
    if (keyword === 'nosym') return { kind: 'none' };
    if (keyword === 'metric') return pairSymmetry(symbol, rank, 'sym01');
    if (keyword === 'kronecker') {
        if (rank !== 2) throw new TensorError(`cannot instantiate kronecker delta of rank ${rank}`);
        return { kind: 'kronecker' };
    }
    if (keyword === 'permutation') return { kind: 'permutation' };
    return pairSymmetry(symbol, rank, keyword);
}

function pairSymmetry(symbol: string, rank: number, keyword: string): Symmetry {
    const pairs: SymmetryPair[] = [];
    for (const part of keyword.split('_')) {
        const found = /^(sym|anti)([0-9]+)$/.exec(part);
        if (!found) throw new TensorError(`unsupported symmetry '${part}'`);
        const kind = found[1] === 'sym' ? 'sym' : 'anti';
        const slots = [...found[2]].map(Number);
        if (slots.length < 2 || slots.some(slot => slot >= rank)) {
            throw new TensorError(`symmetry '${part}' outside the rank ${rank} of '${symbol}'`);
        }
        for (let i = 0; i + 1 < slots.length; i++) {
            pairs.push({ kind, first: slots[i], second: slots[i + 1] });
        }
    }
    return { kind: 'pairs', pairs };
}

export interface CanonicalIndices {
    indices: number[];
    sign: -1 | 0 | 1;
}

/**
 * Sorts the indices of every related pair, tracking the sign picked up
 * by antisymmetric swaps. A repeated value on an antisymmetric pair
 * gives sign 0.
 */
export function canonicalize(indices: readonly number[], pairs: readonly SymmetryPair[]): CanonicalIndices {
    const out = [...indices];
    let sign: -1 | 1 = 1;
    let swapped = true;
    while (swapped) {
        swapped = false;
        for (const { kind, first, second } of pairs) {
            if (kind === 'anti' && out[first] === out[second]) return { indices: out, sign: 0 };
            if (out[first] > out[second]) {
                [out[first], out[second]] = [out[second], out[first]];
                if (kind === 'anti') sign = sign === 1 ? -1 : 1;
                swapped = true;
            }
        }
    }
    return { indices: out, sign };
}

/** Sign of the permutation `indices`, 0 when a value repeats. */
export function permutationSign(indices: readonly number[]): -1 | 0 | 1 {
    if (new Set(indices).size !== indices.length) return 0;
    let sign: -1 | 1 = 1;
    for (let i = 0; i < indices.length; i++) {
        for (let j = i + 1; j < indices.length; j++) {
            if (indices[i] > indices[j]) sign = sign === 1 ? -1 : 1;
        }
    }
    return sign;
}

/** Symmetry of the derivative tensor built from `base`: inherited pairs, symmetric derivative slots. */
export function derivativeSymmetry(base: TensorDecl): Symmetry {
    const inherited = base.symmetry.kind === 'pairs' ? base.symmetry.pairs : [];
    const rank = base.pattern.length + 1;
    const pairs = base.symbol.includes('_d')
        ? [...inherited, { kind: 'sym' as const, first: rank - 2, second: rank - 1 }]
        : inherited;
    return pairs.length ? { kind: 'pairs', pairs } : { kind: 'none' };
}

// ── Components ──────────────────────────────────────────────

/** Every index tuple of the given rank, row-major. */
export function* indexTuples(rank: number, dimension: number): Generator<number[]> {
    if (rank === 0) {
        yield [];
        return;
    }
    for (const head of indexTuples(rank - 1, dimension)) {
        for (let value = 0; value < dimension; value++) yield [...head, value];
    }
}

function componentValue(decl: TensorDecl, indices: readonly number[]): Expr {
    const { symmetry } = decl;
    switch (symmetry.kind) {
        case 'kronecker':
            return indices[0] === indices[1] ? ONE : ZERO;
        case 'permutation':
            return mk.int(permutationSign(indices));
        case 'none':
            return mk.sym(componentName(decl.symbol, indices));
        case 'pairs': {
            const canonical = canonicalize(indices, symmetry.pairs);
            if (canonical.sign === 0) return ZERO;
            const value = mk.sym(componentName(decl.symbol, canonical.indices));
            return canonical.sign === 1 ? value : neg(value);
        }
    }
}

/** Registers `decl` and binds a generated value for every component. */
export function instantiate(session: Session, decl: TensorDecl, bindings: Map<string, Expr>): void {
    session.tensors.set(decl.symbol, decl);
    for (const indices of indexTuples(decl.pattern.length, decl.dimension)) {
        session.bind(componentName(decl.symbol, indices), componentValue(decl, indices), bindings);
    }
}

/** Removes a tensor, its components and its stored equation. */
export function dropTensor(session: Session, symbol: string): void {
    const decl = session.tensors.get(symbol);
    if (!decl) return;
    for (const indices of indexTuples(decl.pattern.length, decl.dimension)) {
        session.namespace.delete(componentName(symbol, indices));
    }
    session.tensors.delete(symbol);
    session.equations.delete(symbol);
}

/** Declares the tensor of one more derivative of `symbol` unless it exists. */
export function ensureDerivativeTensor(session: Session, symbol: string, bindings: Map<string, Expr>): string {
    const target = derivativeSymbol(symbol);
    if (session.tensors.has(target)) return target;
    const dimension = session.requireDimension();
    const base: TensorDecl = session.tensors.get(symbol)
        ?? { symbol, pattern: indexPattern(symbol), dimension, symmetry: { kind: 'none' } };
    instantiate(session, {
        symbol: target,
        pattern: indexPattern(target),
        dimension,
        symmetry: derivativeSymmetry(base),
    }, bindings);
    return target;
}

export function lookupComponent(session: Session, symbol: string, indices: readonly number[]): Expr {
    const decl = session.tensors.get(symbol);
    if (!decl) throw new TensorError(`undefined tensor '${symbol}'`);
    if (indices.some(value => value < 0 || value >= decl.dimension)) {
        throw new TensorError(`index out of range for '${symbol}' of dimension ${decl.dimension}`);
    }
    const name = componentName(symbol, indices);
    const value = session.namespace.get(name);
    if (value === undefined) throw new TensorError(`undefined component '${name}'`);
    return value;
}

// ── Declarations ────────────────────────────────────────────

export interface Declaration {
    symbol: string;
    /** Symmetry keyword (`nosym`, `sym01`, `metric`, `const`, …); `null` for none. */
    keyword: string | null;
    dimension: number | null;
}

/** Handles one `% define` item; metric contexts are registered by the caller. */
export function declare(session: Session, { symbol, keyword, dimension }: Declaration, bindings: Map<string, Expr>): void {
    const pattern = indexPattern(symbol);
    if (keyword === 'const') {
        if (dimension !== null) session.fixDimension(dimension);
        session.announceRedefinition(symbol);
        session.constants.add(symbol);
        session.bind(symbol, mk.sym(symbol), bindings);
        return;
    }
    if (dimension === null) throw new TensorError('dimension only omittable for constant');
    session.fixDimension(dimension);
    if (keyword === 'metric' && pattern.length !== 2) {
        throw new TensorError(`cannot invert tensor of rank ${pattern.length}`);
    }
    session.announceRedefinition(symbol);
    if (pattern.length === 0) {
        session.bind(symbol, mk.sym(symbol), bindings);
        return;
    }
    const symmetry: Symmetry = keyword === null ? { kind: 'none' } : parseSymmetry(keyword, symbol, pattern.length);
    session.equations.delete(symbol);
    instantiate(session, { symbol, pattern, dimension, symmetry }, bindings);
}
