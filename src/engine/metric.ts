// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Metric Contexts
// Inverse, determinant and cache invalidation per diacritic
// ─────────────────────────────────────────────────────────────

import { ONE, MINUS_ONE } from '../core/expr';
import type { Expr, Position } from '../core/expr';
import { add, mul, pow } from '../core/algebra';
import { TensorError } from '../parser/errors';
import type { Diacritic, MetricContext, Session } from './session';
import { baseOf, componentName, dropTensor, indexPattern, lookupComponent } from './tensor';

// ── Matrix algebra ──────────────────────────────────────────

type Matrix = readonly (readonly Expr[])[];

function minor(matrix: Matrix, row: number, column: number): Matrix {
    return matrix
        .filter((_, i) => i !== row)
        .map(entries => entries.filter((_, j) => j !== column));
}

/** Laplace expansion along the first row; the empty matrix has determinant 1. */
export function determinant(matrix: Matrix): Expr {
    if (matrix.length === 0) return ONE;
    return add(...matrix[0].map((entry, j) =>
        mul(j % 2 ? MINUS_ONE : ONE, entry, determinant(minor(matrix, 0, j)))));
}

export interface Inversion {
    inverse: Expr[][];
    determinant: Expr;
}

/** Adjugate over determinant. */
export function invert(matrix: Matrix): Inversion {
    const det = determinant(matrix);
    const reciprocal = pow(det, MINUS_ONE);
    const inverse = matrix.map((_, i) => matrix.map((__, j) =>
        mul((i + j) % 2 ? MINUS_ONE : ONE, determinant(minor(matrix, j, i)), reciprocal)));
    return { inverse, determinant: det };
}

// ── Contexts ────────────────────────────────────────────────

const DIACRITICS: readonly Diacritic[] = ['hat', 'bar', 'tilde'];

export function diacriticOf(base: string): Diacritic {
    for (const diacritic of DIACRITICS) {
        if (base.length > diacritic.length && base.endsWith(diacritic)) return diacritic;
    }
    return '';
}

export function christoffelSymbol(diacritic: Diacritic): string {
    return `Gamma${diacritic}UDD`;
}

/**
 * Computes the inverse and determinant of the rank-2 tensor `symbol`
 * from its current components, and registers the metric context of
 * its diacritic. Cached objects derived from the previous metric of
 * that context are dropped.
 */
export function registerMetric(session: Session, symbol: string, bindings: Map<string, Expr>): MetricContext {
    const decl = session.tensors.get(symbol);
    if (!decl) throw new TensorError(`cannot update undefined tensor '${symbol}'`);
    const rank = decl.pattern.length;
    if (rank !== 2 || decl.pattern[0] !== decl.pattern[1]) {
        throw new TensorError(`cannot invert tensor of rank ${rank}`);
    }

    const { dimension } = decl;
    const range = [...Array(dimension).keys()];
    const matrix = range.map(i => range.map(j => lookupComponent(session, symbol, [i, j])));
    const { inverse, determinant: det } = invert(matrix);

    const base = baseOf(symbol);
    const diacritic = diacriticOf(base);
    const upper = decl.pattern[0] === 'U';
    const position: Position = upper ? 'D' : 'U';
    const inverseSymbol = base + position + position;
    const determinantSymbol = `${base}det`;

    invalidate(session, diacritic);
    session.tensors.set(inverseSymbol, {
        symbol: inverseSymbol,
        pattern: indexPattern(inverseSymbol),
        dimension,
        symmetry: { kind: 'pairs', pairs: [{ kind: 'sym', first: 0, second: 1 }] },
    });
    for (const i of range) {
        for (const j of range) {
            const value = i <= j ? inverse[i][j] : inverse[j][i];
            session.bind(componentName(inverseSymbol, [i, j]), value, bindings);
        }
    }
    session.bind(determinantSymbol, upper ? pow(det, MINUS_ONE) : det, bindings);

    const context: MetricContext = {
        diacritic,
        lower: upper ? inverseSymbol : symbol,
        upper: upper ? symbol : inverseSymbol,
        determinant: determinantSymbol,
    };
    session.metrics.set(diacritic, context);
    return context;
}

/** Drops the Christoffel symbols and covariant derivatives of one metric context. */
export function invalidate(session: Session, diacritic: Diacritic): void {
    const covariant = new RegExp(`_cd${diacritic}[UD]`);
    for (const symbol of [...session.tensors.keys()]) {
        if (symbol === christoffelSymbol(diacritic) || covariant.test(symbol)) {
            session.logger.info(`[Synthesizer] dropping cached '${symbol}'`);
            dropTensor(session, symbol);
        }
    }
}
