// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Translation Session
// Namespace, declarations and directive state of one user
// ─────────────────────────────────────────────────────────────

import type { Expr, Position } from '../core/expr';
import { TensorError } from '../parser/errors';

// ── Options ─────────────────────────────────────────────────

export interface Logger {
    warn(message: string): void;
    info(message: string): void;
}

export interface SessionOptions {
    /** Report a failing structure and resume at the next line break. */
    continueOnError: boolean;
    /** Suppress the warning logged when `% define` overrides a name. */
    quietRedefinition: boolean;
    logger: Logger;
}

const DEFAULT_OPTIONS: SessionOptions = {
    continueOnError: false,
    quietRedefinition: false,
    logger: console,
};

// ── Declarations ────────────────────────────────────────────

export type Diacritic = '' | 'hat' | 'bar' | 'tilde';
export type DerivativeMode = 'symbolic' | '_d';

export interface SymmetryPair {
    kind: 'sym' | 'anti';
    first: number;
    second: number;
}

export type Symmetry =
    | { kind: 'none' }
    | { kind: 'pairs'; pairs: readonly SymmetryPair[] }
    | { kind: 'kronecker' }
    | { kind: 'permutation' };

export interface TensorDecl {
    symbol: string;
    pattern: readonly Position[];
    dimension: number;
    symmetry: Symmetry;
}

export interface MetricContext {
    diacritic: Diacritic;
    lower: string;
    upper: string;
    determinant: string;
}

/** Half-open range of concrete values an index label runs over. */
export interface IndexRange {
    start: number;
    stop: number;
}

// ── Session ─────────────────────────────────────────────────

export class Session {
    readonly options: SessionOptions;
    readonly namespace = new Map<string, Expr>();
    readonly tensors = new Map<string, TensorDecl>();
    readonly metrics = new Map<Diacritic, MetricContext>();
    readonly ranges = new Map<string, IndexRange>();
    /** Source of the last equation that assigned each tensor, for `% update`. */
    readonly equations = new Map<string, string>();
    readonly constants = new Set<string>();
    basis: string[] = [];
    derivative: DerivativeMode = 'symbolic';
    dimension: number | null = null;

    constructor(options: Partial<SessionOptions> = {}) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    get logger(): Logger {
        return this.options.logger;
    }

    clear(): void {
        this.namespace.clear();
        this.tensors.clear();
        this.metrics.clear();
        this.ranges.clear();
        this.equations.clear();
        this.constants.clear();
        this.basis = [];
        this.derivative = 'symbolic';
        this.dimension = null;
    }

    // ── Dimension and ranges ────────────────────────────────

    fixDimension(dimension: number): void {
        if (this.dimension !== null && this.dimension !== dimension) {
            throw new TensorError('inconsistent tensor dimension');
        }
        this.dimension = dimension;
    }

    requireDimension(): number {
        if (this.dimension === null) throw new TensorError('undefined tensor dimension');
        return this.dimension;
    }

    rangeOf(label: string): IndexRange {
        return this.ranges.get(label) ?? { start: 0, stop: this.requireDimension() };
    }

    isCoordinate(label: string): boolean {
        return this.basis.includes(label);
    }

    // ── Bindings ────────────────────────────────────────────

    bind(name: string, value: Expr, bindings: Map<string, Expr>): void {
        this.namespace.set(name, value);
        bindings.set(name, value);
    }

    /** Warns before a declaration replaces an existing name. */
    announceRedefinition(symbol: string): void {
        if (this.options.quietRedefinition) return;
        if (this.tensors.has(symbol) || this.namespace.has(symbol)) {
            this.logger.warn(`[Namespace] overriding '${symbol}'`);
        }
    }

    hasTensorPrefix(prefix: string): boolean {
        for (const symbol of this.tensors.keys()) {
            if (symbol.startsWith(prefix)) return true;
        }
        return false;
    }

    metricContext(diacritic: Diacritic): MetricContext {
        const context = this.metrics.get(diacritic);
        if (!context) throw new TensorError(`undefined metric${diacritic ? ` (${diacritic})` : ''}`);
        return context;
    }
}
