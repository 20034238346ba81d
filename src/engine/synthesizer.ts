// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Derived-Object Synthesizer
// Generates the LaTeX equations of Christoffel symbols and
// covariant derivatives; the parser translates them in-session
// ─────────────────────────────────────────────────────────────

import type { Position } from '../core/expr';
import { GREEK_LETTERS } from '../parser/lexer';
import { TensorError } from '../parser/errors';
import type { DerivativeMode, Diacritic, MetricContext } from './session';
import { baseOf, indexPattern } from './tensor';

export interface Nabla {
    label: string;
    position: Position;
}

// ── LaTeX fragments ─────────────────────────────────────────

const LABELS = [...'abcdfghijklmnopqrstuvwxyz'];

/** `count` single-letter labels that are not coordinates. */
export function freshLabels(count: number, exclude: readonly string[]): string[] {
    const labels = LABELS.filter(label => !exclude.includes(label)).slice(0, count);
    if (labels.length < count) throw new TensorError('too many indices to relabel');
    return labels;
}

export function latexLabel(label: string): string {
    return label.length > 1 ? `\\${label}` : label;
}

export function latexSymbol(base: string): string {
    for (const diacritic of ['hat', 'bar', 'tilde']) {
        if (base.length > diacritic.length && base.endsWith(diacritic)) {
            return `\\${diacritic}{${latexSymbol(base.slice(0, -diacritic.length))}}`;
        }
    }
    if (GREEK_LETTERS.has(base)) return `\\${base}`;
    return base.length === 1 ? base : `\\mathop{${base}}`;
}

function phantom(mode: DerivativeMode): string {
    return `\\vphantom{${mode}}`;
}

function nablaOperator(diacritic: Diacritic): string {
    return diacritic ? `\\${diacritic}{\\nabla}` : '\\nabla';
}

/**
 * LaTeX reference to a declared or derivative tensor, with one label
 * per slot: `renderTensor('vU_dD', ['a', 'b'])` → `v^{a}_{, b}`.
 */
export function renderTensor(symbol: string, labels: readonly string[]): string {
    const root = symbol.split('_d')[0];
    const pattern = indexPattern(root);
    if (symbol.includes('_cd') || pattern.join('').includes('DU')) {
        throw new TensorError(`cannot differentiate '${symbol}' covariantly`);
    }
    const upper = labels.filter((_, i) => i < pattern.length && pattern[i] === 'U').map(latexLabel);
    const lower = labels.filter((_, i) => i < pattern.length && pattern[i] === 'D').map(latexLabel);
    const derivatives = labels.slice(pattern.length).map(latexLabel);

    let latex = latexSymbol(baseOf(root));
    if (upper.length) latex += `^{${upper.join(' ')}}`;
    if (derivatives.length) lower.push(',', ...derivatives);
    if (lower.length) latex += `_{${lower.join(' ')}}`;
    return latex;
}

// ── Christoffel symbols ─────────────────────────────────────

/** `Γ^a_{bc} = ½ g^{ad} (∂_b g_{cd} + ∂_c g_{db} − ∂_d g_{bc})` in the given metric context. */
export function christoffelEquation(context: MetricContext, mode: DerivativeMode, exclude: readonly string[]): string {
    const [a, b, c, d] = freshLabels(4, exclude);
    const gamma = latexSymbol(`Gamma${context.diacritic}`);
    const partial = `${phantom(mode)} \\partial`;
    const g = (first: string, second: string): string => renderTensor(context.lower, [first, second]);
    return `${gamma}^${a}_{${b} ${c}} = \\frac{1}{2} ${renderTensor(context.upper, [a, d])} `
        + `(${partial}_${b} ${g(c, d)} + ${partial}_${c} ${g(d, b)} - ${partial}_${d} ${g(b, c)})`;
}

// ── Covariant derivatives ───────────────────────────────────

/**
 * Symbol of `∇…∇ T`, nablas in written order. Slots are the tensor's
 * own indices followed by the derivative indices, innermost first.
 */
export function covariantSymbol(tensor: string, diacritic: Diacritic, nablas: readonly Nabla[]): string {
    return `${tensor}_cd${diacritic}` + [...nablas].reverse().map(n => n.position).join('');
}

export interface CovariantRequest {
    tensor: string;
    /** Written order: the outermost operator first. */
    nablas: readonly Nabla[];
    diacritic: Diacritic;
    mode: DerivativeMode;
    context: MetricContext;
    exclude: readonly string[];
}

/**
 * Defining equation of the outermost nabla. A lower nabla is a partial
 * derivative plus one connection term per slot of its operand; an upper
 * nabla raises a lower one through the inverse metric.
 */
export function covariantEquation(request: CovariantRequest): string {
    const { tensor, diacritic, mode, context } = request;
    const [outer, ...inner] = request.nablas;
    const rank = indexPattern(tensor).length;
    const positions = [...indexPattern(tensor), ...[...inner].reverse().map(n => n.position)];
    const labels = freshLabels(positions.length + 2, request.exclude);
    const slots = labels.slice(0, positions.length);
    const index = labels[positions.length];
    const dummy = labels[positions.length + 1];
    const nabla = nablaOperator(diacritic);
    const gamma = latexSymbol(`Gamma${diacritic}`);
    const script = (position: Position): string => (position === 'U' ? '^' : '_');

    const chain = (slotLabels: readonly string[]): string => {
        const operators = inner.map((n, written) =>
            `${nabla}${script(n.position)}${slotLabels[rank + inner.length - 1 - written]}`);
        return [...operators, renderTensor(tensor, slotLabels.slice(0, rank))].join(' ');
    };
    const operand = (slotLabels: readonly string[]): string =>
        inner.length ? `${phantom(mode)} ${chain(slotLabels)}` : chain(slotLabels);

    const lhs = `${nabla}${script(outer.position)}${index} ${chain(slots)}`;
    if (outer.position === 'U') {
        return `${lhs} = ${renderTensor(context.upper, [index, dummy])} ${phantom(mode)} ${nabla}_${dummy} ${chain(slots)}`;
    }

    const terms = [`${phantom(mode)} \\partial_${index} (${operand(slots)})`];
    positions.forEach((position, i) => {
        const relabeled = slots.map((label, j) => (j === i ? dummy : label));
        terms.push(position === 'U'
            ? `+ ${gamma}^${slots[i]}_{${dummy} ${index}} (${operand(relabeled)})`
            : `- ${gamma}^${dummy}_{${slots[i]} ${index}} (${operand(relabeled)})`);
    });
    return `${lhs} = ${terms.join(' ')}`;
}
