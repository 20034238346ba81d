// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Parser Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { createSession, parse, parseExpr, toString } from '../index';
import type { Expr } from '../core/expr';
import { mk, equals } from '../core/expr';
import { add, mul, pow, func, div } from '../core/algebra';
import { ParseError } from '../parser/errors';

function expr(sentence: string): Expr {
    const result = parseExpr(sentence);
    if (!result.ok) throw result.error;
    return result.expr;
}

function failure(sentence: string) {
    const result = parseExpr(sentence);
    if (result.ok) throw new Error(`expected '${sentence}' to fail`);
    return result.error;
}

const x = mk.sym('x');
const n = mk.sym('n');

describe('parseExpr', () => {
    describe('arithmetic', () => {
        it('parses the compound interest limit', () => {
            const parsed = expr('(1 + x/n)^n');
            expect(equals(parsed, pow(add(mk.int(1), mul(x, pow(n, mk.int(-1)))), n))).toBe(true);
            expect(toString(parsed)).toBe('(1 + x/n)^n');
        });

        it('is deterministic', () => {
            expect(toString(expr('a + 2 b - a'))).toBe(toString(expr('a + 2 b - a')));
            expect(toString(expr('a + 2 b - a'))).toBe('2*b');
        });

        it('binds unary minus looser than powers', () => {
            expect(toString(expr('-x^2'))).toBe('-x^2');
            expect(toString(expr('(-x)^2'))).toBe('x^2');
        });

        it('treats juxtaposition and explicit operators as products', () => {
            expect(toString(expr('2 x y'))).toBe('2*x*y');
            expect(toString(expr('2 \\cdot x \\times y'))).toBe('2*x*y');
        });

        it('associates powers to the right', () => {
            expect(equals(expr('2^3^2'), mk.int(512))).toBe(true);
        });

        it('reads a doubly braced exponent as a power', () => {
            expect(toString(expr('x^{{2}}'))).toBe('x^2');
            expect(toString(expr('x^2'))).toBe('x^2');
        });
    });

    describe('numbers', () => {
        it('keeps rationals exact', () => {
            expect(expr('3/4')).toEqual(mk.rational(3, 4));
            expect(expr('\\frac{1}{2} + \\frac{1}{3}')).toEqual(mk.rational(5, 6));
        });

        it('keeps large integers exact', () => {
            expect(toString(expr('12345678901234567891 - 12345678901234567890'))).toBe('1');
            expect(toString(expr('3^{{40}}'))).toBe('12157665459056928801');
            expect(expr('\\frac{1}{12345678901234567890}')).toEqual(mk.rational(1n, 12345678901234567890n));
        });

        it('keeps decimals as floats', () => {
            expect(toString(expr('0.5x'))).toBe('0.5*x');
        });

        it('reads pi and Euler\'s number', () => {
            expect(toString(expr('2\\pi'))).toBe('2*pi');
            expect(toString(expr('e'))).toBe('e');
        });
    });

    describe('commands', () => {
        it('parses fractions', () => {
            expect(equals(expr('\\frac{a}{b}'), div(mk.sym('a'), mk.sym('b')))).toBe(true);
        });

        it('parses roots', () => {
            expect(toString(expr('\\sqrt{x}'))).toBe('x^(1/2)');
            expect(toString(expr('\\sqrt[3]{x}'))).toBe('x^(1/3)');
            expect(expr('\\sqrt{4}')).toEqual(mk.int(2));
        });

        it('parses logarithms', () => {
            expect(equals(expr('\\ln x'), func('log', x))).toBe(true);
            expect(toString(expr('\\log x'))).toBe('log(x)/log(10)');
            expect(toString(expr('\\log_2 x'))).toBe('log(x)/log(2)');
        });

        it('parses trigonometric powers and inverses', () => {
            expect(toString(expr('\\sin^2 x'))).toBe('sin(x)^2');
            expect(toString(expr('\\sin^{-1} x'))).toBe('asin(x)');
            expect(toString(expr('\\cosh(2x)'))).toBe('cosh(2*x)');
        });

        it('reads e^x as the exponential', () => {
            expect(equals(expr('e^x'), func('exp', x))).toBe(true);
            expect(toString(expr('e^{2x}'))).toBe('exp(2*x)');
        });

        it('rejects unsupported commands at the backslash', () => {
            const error = failure('\\command{x}');
            expect(error).toBeInstanceOf(ParseError);
            expect(error.message).toBe("unsupported command '\\command' at position 0");
            expect(error.position).toBe(0);
        });

        it('requires an integer root degree', () => {
            const error = failure('\\sqrt[0.5]{2}');
            expect(error).toBeInstanceOf(ParseError);
            expect(error.message).toBe('expected token INTEGER at position 6');
        });
    });

    describe('errors', () => {
        it('reports a missing closing parenthesis', () => {
            expect(failure('(a + b').message).toBe('expected token RIGHT_PAREN at position 6');
        });

        it('reports trailing tokens', () => {
            expect(failure('a )').message).toBe("unexpected ')' at position 2");
        });

        it('reports an unknown character as a LexError', () => {
            const error = failure('a + #');
            expect(error.kind).toBe('lex');
            expect(error.message).toBe("unexpected '#' at position 4");
        });

        it('points a non-index superscript to the power form', () => {
            expect(failure('x^{-1}').message)
                .toBe("unexpected '-' in superscript at position 3 (write a power as ^{{...}})");
            expect(toString(expr('x^{{-1}}'))).toBe('1/x');
        });

        it('reads a letter superscript as an index', () => {
            expect(failure('-a^b').message).toBe("undefined tensor 'aU'");
            expect(toString(expr('-a^{{b}}'))).toBe('-a^b');
        });

        it('reports an undefined tensor', () => {
            expect(failure('v^a').message).toBe("undefined tensor 'vU'");
        });

        it('refuses free indices in a standalone expression', () => {
            const session = createSession();
            parse('% define nosym vU (2)', session);
            const result = parseExpr('v^a', session);
            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.message).toBe("unbalanced free index 'a'");
        });

        it('evaluates declared components', () => {
            const session = createSession();
            parse('% define nosym vU (2)', session);
            const result = parseExpr('v^0 + v^1', session);
            expect(result.ok && toString(result.expr)).toBe('vU0 + vU1');
        });
    });
});
