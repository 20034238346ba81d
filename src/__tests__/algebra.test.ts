// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Algebra & Calculus Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { mk, equals, keyOf, ZERO, ONE } from '../core/expr';
import { add, mul, pow, neg, sub, div, func, derivative, expand, termsOf } from '../core/algebra';
import { diff, differentiate } from '../core/calculus';
import { prettyExpr } from '../core/pretty';

const x = mk.sym('x');
const y = mk.sym('y');
const two = mk.int(2);

describe('canonical forms', () => {
    it('reduces rationals', () => {
        expect(mk.rational(4, -6)).toEqual({ tag: 'Rational', num: -2n, den: 3n });
        expect(() => mk.rational(1, 0)).toThrow(RangeError);
    });

    it('collects like terms', () => {
        expect(prettyExpr(add(x, y, x))).toBe('2*x + y');
        expect(add(x, neg(x))).toEqual(ZERO);
    });

    it('puts the numeric term first', () => {
        expect(prettyExpr(add(y, mk.int(3)))).toBe('3 + y');
    });

    it('is insensitive to operand order', () => {
        expect(keyOf(add(x, mul(two, y)))).toBe(keyOf(add(mul(y, two), x)));
        expect(keyOf(mul(x, y))).toBe(keyOf(mul(y, x)));
    });

    it('combines powers of the same base', () => {
        expect(prettyExpr(mul(x, x))).toBe('x^2');
        expect(mul(pow(x, two), pow(x, mk.int(-2)))).toEqual(ONE);
    });

    it('evaluates exact powers of numbers', () => {
        expect(pow(mk.rational(9, 4), mk.rational(1, 2))).toEqual(mk.rational(3, 2));
        expect(pow(two, mk.int(-2))).toEqual(mk.rational(1, 4));
        expect(prettyExpr(pow(two, mk.rational(1, 2)))).toBe('2^(1/2)');
    });

    it('prints quotients and differences', () => {
        expect(prettyExpr(div(x, mul(two, y)))).toBe('x/(2*y)');
        expect(prettyExpr(sub(x, y))).toBe('x - y');
        expect(prettyExpr(neg(add(x, y)))).toBe('-(x + y)');
    });

    it('simplifies functions at special points', () => {
        expect(func('sin', ZERO)).toEqual(ZERO);
        expect(func('cos', ZERO)).toEqual(ONE);
        expect(func('log', mk.e())).toEqual(ONE);
        expect(pow(mk.e(), x)).toEqual(func('exp', x));
    });
});

describe('expand', () => {
    it('distributes products over sums', () => {
        expect(prettyExpr(expand(mul(x, add(x, y))))).toBe('x*y + x^2');
    });

    it('multiplies out integer powers of sums', () => {
        expect(prettyExpr(expand(pow(add(x, ONE), two)))).toBe('1 + x^2 + 2*x');
    });

    it('pushes derivatives through sums', () => {
        const d = expand(derivative(add(x, y), ['a']));
        expect(prettyExpr(d)).toBe('∂(x, a) + ∂(y, a)');
    });

    it('has no terms for an exact zero', () => {
        expect(termsOf(sub(x, x))).toEqual([]);
        expect(termsOf(x)).toEqual([x]);
    });
});

describe('diff', () => {
    it('applies the power rule', () => {
        expect(prettyExpr(diff(pow(x, mk.int(3)), 'x'))).toBe('3*x^2');
    });

    it('applies the product rule', () => {
        expect(prettyExpr(diff(mul(x, y), 'x'))).toBe('y');
        expect(prettyExpr(diff(mul(x, func('sin', x)), 'x'))).toBe('cos(x)*x + sin(x)');
    });

    it('applies the chain rule', () => {
        expect(prettyExpr(diff(func('sin', mul(two, x)), 'x'))).toBe('2*cos(2*x)');
        expect(prettyExpr(diff(func('log', x), 'x'))).toBe('1/x');
        expect(equals(diff(func('exp', x), 'x'), func('exp', x))).toBe(true);
    });

    it('differentiates general powers', () => {
        expect(prettyExpr(diff(pow(two, x), 'x'))).toBe('2^x*log(2)');
    });

    it('treats other symbols as constants', () => {
        expect(diff(y, 'x')).toEqual(ZERO);
    });

    it('defers atoms it cannot see into', () => {
        const v = mk.indexed('vU', [{ label: 0, position: 'U' }]);
        expect(diff(v, 'x')).toEqual(derivative(v, ['x']));
        const tagged = differentiate(mul(x, v), () => ONE);
        expect(prettyExpr(tagged)).toBe('vU[0] + x');
    });
});
