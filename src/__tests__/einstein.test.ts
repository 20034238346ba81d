// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Einstein Summation Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { createSession, parse, parseExpr, toString } from '../index';
import type { Expr } from '../core/expr';
import { TensorError } from '../parser/errors';

function show(bindings: ReadonlyMap<string, Expr>, name: string): string {
    const value = bindings.get(name);
    if (value === undefined) throw new Error(`'${name}' is not bound`);
    return toString(value);
}

describe('index contraction', () => {
    it('sums a trace over the repeated index', () => {
        const { bindings, errors } = parse('% define nosym hUD (4); h = h^\\mu{}_\\mu');
        expect(errors).toEqual([]);
        expect(show(bindings, 'h')).toBe('hUD00 + hUD11 + hUD22 + hUD33');
    });

    it('raises an index through the metric', () => {
        const { bindings, errors } = parse('% define metric gUU (3), nosym vD (3); v^\\mu = g^{\\mu\\nu} v_\\nu');
        expect(errors).toEqual([]);
        expect(show(bindings, 'vU0')).toBe('gUU00*vD0 + gUU01*vD1 + gUU02*vD2');
        expect(show(bindings, 'vU1')).toBe('gUU01*vD0 + gUU11*vD1 + gUU12*vD2');
        expect(show(bindings, 'vU2')).toBe('gUU02*vD0 + gUU12*vD1 + gUU22*vD2');
    });

    it('produces one component per free index assignment, row-major', () => {
        const { bindings } = parse('% define nosym uU (2), nosym wD (2); M^a_b = u^a w_b');
        const names = [...bindings.keys()].filter(name => name.startsWith('MUD'));
        expect(names).toEqual(['MUD00', 'MUD01', 'MUD10', 'MUD11']);
        expect(show(bindings, 'MUD10')).toBe('uU1*wD0');
    });

    it('expands products of sums before balancing', () => {
        const { bindings, errors } = parse('% define nosym uU (2), nosym wD (2); s = (u^a + u^a) w_a');
        expect(errors).toEqual([]);
        expect(show(bindings, 's')).toBe('2*uU0*wD0 + 2*uU1*wD1');
    });

    it('reads every component before assigning any', () => {
        const { bindings, errors } = parse('% define nosym MDD (2); M_{ab} = M_{ba}');
        expect(errors).toEqual([]);
        expect(show(bindings, 'MDD01')).toBe('MDD10');
        expect(show(bindings, 'MDD10')).toBe('MDD01');
        expect(show(bindings, 'MDD11')).toBe('MDD11');
    });

    it('honours custom index ranges', () => {
        const { bindings, errors } = parse('% define nosym vU (4), nosym wD (4), index i = 1:3; s = v^i w_i');
        expect(errors).toEqual([]);
        expect(show(bindings, 's')).toBe('vU1*wD1 + vU2*wD2 + vU3*wD3');
    });
});

describe('index balance', () => {
    it('rejects an index bound more than twice', () => {
        const { errors } = parse('% define nosym uU (2), nosym vU (2), nosym wU (2); t = u^a v^a w^a');
        expect(errors).toHaveLength(1);
        expect(errors[0]).toBeInstanceOf(TensorError);
        expect(errors[0].message).toBe("illegal bound index 'a'");
    });

    it('rejects a term missing a free index', () => {
        const { errors } = parse('% define nosym uU (2); t^a = u^a + s');
        expect(errors[0]).toBeInstanceOf(TensorError);
        expect(errors[0].message).toBe("unbalanced free index 'a'");
    });

    it('locates engine errors at the start of their assignment', () => {
        const sentence = '% define nosym uU (2); t^a = u^a + s';
        const { errors } = parse(sentence);
        expect(errors[0].position).toBe(sentence.indexOf('t^a'));
        expect(errors[0].column).toBe(23);
    });

    it('leaves the target undeclared when an expansion fails', () => {
        const session = createSession();
        const { errors } = parse('% define nosym vU (2), index i = 1:3; w^i = v^i', session);
        expect(errors[0].message).toBe("index out of range for 'vU' of dimension 2");
        expect(session.tensors.has('wU')).toBe(false);
        expect(session.namespace.has('wU1')).toBe(false);
        const result = parseExpr('w^a v_a', session);
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.message).toBe("undefined tensor 'wU'");
    });

    it('needs a dimension for an undeclared target', () => {
        const { errors } = parse('v^a = 0');
        expect(errors[0].message).toBe('undefined tensor dimension');
    });
});

describe('symmetry', () => {
    it('reuses symmetric components', () => {
        const { bindings } = parse('% define sym01 gDD (2); x = g_{10}');
        expect(show(bindings, 'gDD10')).toBe('gDD01');
        expect(show(bindings, 'x')).toBe('gDD01');
    });

    it('negates antisymmetric components and zeroes the diagonal', () => {
        const { bindings } = parse('% define anti01 FUU (3)');
        expect(show(bindings, 'FUU21')).toBe('-FUU12');
        expect(show(bindings, 'FUU11')).toBe('0');
    });

    it('generates kronecker and permutation symbols', () => {
        const { bindings } = parse('% define kronecker deltaUD (3), permutation epsilonDDD (3)');
        expect(show(bindings, 'deltaUD00')).toBe('1');
        expect(show(bindings, 'deltaUD01')).toBe('0');
        expect(show(bindings, 'epsilonDDD012')).toBe('1');
        expect(show(bindings, 'epsilonDDD102')).toBe('-1');
        expect(show(bindings, 'epsilonDDD112')).toBe('0');
    });

    it('rejects a kronecker delta that is not rank 2', () => {
        const { errors } = parse('% define kronecker deltaU (2)');
        expect(errors[0].message).toBe('cannot instantiate kronecker delta of rank 1');
    });

    it('rejects a symmetry outside the rank', () => {
        const { errors } = parse('% define sym12 hUD (2)');
        expect(errors[0].message).toBe("symmetry 'sym12' outside the rank 2 of 'hUD'");
    });

    it('reuses the canonical component of a symmetric assignment', () => {
        const { bindings } = parse('% define sym01 hDD (2), nosym uD (2); h_{ab} = u_a u_b + u_b u_a');
        expect(show(bindings, 'hDD01')).toBe('2*uD0*uD1');
        expect(show(bindings, 'hDD10')).toBe('2*uD0*uD1');
        expect(show(bindings, 'hDD11')).toBe('2*uD1^2');
    });
});
