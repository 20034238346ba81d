// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Lexer Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { Lexer, tokenize } from '../parser/lexer';
import { LexError } from '../parser/errors';

const kinds = (sentence: string) => tokenize(sentence).map(t => t.kind);

describe('tokenize', () => {
    it('records the offset of every token', () => {
        expect(tokenize('a + b')).toEqual([
            { kind: 'LETTER', lexeme: 'a', position: 0 },
            { kind: 'PLUS', lexeme: '+', position: 2 },
            { kind: 'LETTER', lexeme: 'b', position: 4 },
        ]);
    });

    it('skips spacing and sizing delimiters', () => {
        expect(kinds('\\left( x \\, \\right)')).toEqual(['LEFT_PAREN', 'LETTER', 'RIGHT_PAREN']);
        expect(kinds('h^\\mu{}_\\mu')).toEqual(['LETTER', 'CARET', 'LETTER', 'UNDERSCORE', 'LETTER']);
    });

    it('prefers the longest command sharing a prefix', () => {
        expect(kinds('\\sinh')).toEqual(['TRIG_CMD']);
        expect(kinds('\\sin')).toEqual(['TRIG_CMD']);
        expect(kinds('\\pit')).toEqual(['COMMAND']);
        expect(kinds('\\pi')).toEqual(['PI']);
    });

    it('lexes numbers', () => {
        expect(kinds('3/4 0.5 12')).toEqual(['RATIONAL', 'DECIMAL', 'INTEGER']);
        expect(kinds('\\frac{1}{2}')).toEqual(['RATIONAL']);
        expect(kinds('\\frac{x}{2}')).toEqual(['FRAC_CMD', 'LEFT_BRACE', 'LETTER', 'RIGHT_BRACE',
            'LEFT_BRACE', 'INTEGER', 'RIGHT_BRACE']);
    });

    it('lexes greek letters in both cases', () => {
        const tokens = tokenize('\\Gamma \\gamma');
        expect(tokens.map(t => t.kind)).toEqual(['LETTER', 'LETTER']);
        expect(tokens.map(t => t.lexeme)).toEqual(['\\Gamma', '\\gamma']);
    });

    it('lexes directives and symmetry keywords', () => {
        expect(kinds('% define sym01_anti23 RDDDD (4)')).toEqual([
            'COMMENT', 'DEFINE_MACRO', 'SYMMETRY', 'LETTER', 'LETTER', 'LETTER', 'LETTER', 'LETTER',
            'LEFT_PAREN', 'INTEGER', 'RIGHT_PAREN',
        ]);
        expect(kinds('deriv _d')).toEqual(['DERIV_KWRD', 'UNDERSCORE', 'LETTER']);
    });

    it('lexes products and line breaks', () => {
        expect(kinds('a \\cdot b * c \\times d')).toEqual([
            'LETTER', 'MULTIPLY', 'LETTER', 'MULTIPLY', 'LETTER', 'MULTIPLY', 'LETTER',
        ]);
        expect(kinds('a; b \\\\ c')).toEqual(['LETTER', 'LINE_BREAK', 'LETTER', 'LINE_BREAK', 'LETTER']);
    });

    it('throws a located LexError on an unknown character', () => {
        expect(() => tokenize('x # y')).toThrow(LexError);
        expect(() => tokenize('x # y')).toThrow("unexpected '#' at position 2");
    });
});

describe('Lexer', () => {
    it('rewinds to a mark', () => {
        const lexer = new Lexer();
        lexer.initialize('x^2 + y');
        lexer.lex();
        lexer.lex();
        expect(lexer.token?.kind).toBe('CARET');
        const mark = lexer.mark();
        lexer.lex();
        lexer.lex();
        expect(lexer.token?.kind).toBe('PLUS');
        lexer.reset(mark);
        expect(lexer.token).toEqual({ kind: 'CARET', lexeme: '^', position: 1 });
    });

    it('reports the end of input as the sentence length', () => {
        const lexer = new Lexer();
        lexer.initialize('ab');
        lexer.lex();
        lexer.lex();
        expect(lexer.lex()).toBeNull();
        expect(lexer.position()).toBe(2);
    });
});
