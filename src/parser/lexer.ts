// ─────────────────────────────────────────────────────────────
// Tensorex  ·  LaTeX Lexer
// Ordered regular-expression matchers over a LaTeX sentence
// ─────────────────────────────────────────────────────────────

import { LexError } from './errors';

// ── Tokens ──────────────────────────────────────────────────

export type TokenKind =
    | 'SPACE_DELIM' | 'BIGL_DELIM' | 'BIGR_DELIM' | 'LEFT_DELIM' | 'RIGHT_DELIM'
    | 'RATIONAL' | 'DECIMAL' | 'INTEGER'
    | 'NABLA' | 'PI' | 'EULER'
    | 'PLUS' | 'MINUS' | 'MULTIPLY' | 'DIVIDE' | 'EQUAL' | 'CARET' | 'COMMA' | 'COLON'
    | 'COMMENT'
    | 'LEFT_PAREN' | 'RIGHT_PAREN' | 'LEFT_BRACE' | 'RIGHT_BRACE' | 'LEFT_BRACKET' | 'RIGHT_BRACKET'
    | 'LINE_BREAK' | 'BEGIN_ALIGN' | 'END_ALIGN'
    | 'PARTIAL' | 'SQRT_CMD' | 'FRAC_CMD' | 'TRIG_CMD' | 'NLOG_CMD' | 'VPHANTOM'
    | 'DEFINE_MACRO' | 'UPDATE_MACRO' | 'PARSE_MACRO'
    | 'INDEX_KWRD' | 'BASIS_KWRD' | 'DERIV_KWRD' | 'DERIV_TYPE'
    | 'UNDERSCORE' | 'DIACRITIC' | 'SYMMETRY' | 'MATHOP'
    | 'LETTER' | 'COMMAND';

export interface Token {
    readonly kind: TokenKind;
    readonly lexeme: string;
    readonly position: number;
}

// ── Matchers ────────────────────────────────────────────────

/** Commands and keywords never match the head of a longer word. */
const END = '(?![a-zA-Z])';

const GREEK = [
    'alpha', 'beta', 'gamma', 'delta', 'epsilon', 'zeta', 'eta', 'theta', 'iota',
    'kappa', 'lambda', 'mu', 'nu', 'xi', 'omikron', 'pi', 'rho', 'sigma', 'tau',
    'upsilon', 'phi', 'chi', 'psi', 'omega',
];

export const GREEK_LETTERS: ReadonlySet<string> = new Set(
    GREEK.flatMap(name => [name, name[0].toUpperCase() + name.slice(1)]));

const greekPattern = GREEK.map(name => `\\\\[${name[0]}${name[0].toUpperCase()}]${name.slice(1)}`).join('|');

const symmetryPattern =
    `(?:const|metric|permutation|kronecker|nosym|(?:sym|anti)[0-9]+(?:_(?:sym|anti)[0-9]+)*)${END}`;

/**
 * Tried in order; the first matcher that matches at the current offset
 * wins. A command sharing a prefix with a shorter one goes first.
 */
const MATCHERS: ReadonlyArray<readonly [TokenKind, string]> = [
    ['SPACE_DELIM', String.raw`(?:\s|\\,|\{\})+|&`],
    ['BIGL_DELIM', String.raw`\\[bB]igl` + END],
    ['BIGR_DELIM', String.raw`\\[bB]igr` + END],
    ['LEFT_DELIM', String.raw`\\left` + END],
    ['RIGHT_DELIM', String.raw`\\right` + END],
    ['RATIONAL', String.raw`[0-9]+\/[1-9][0-9]*|\\frac\{[0-9]+\}\{[1-9][0-9]*\}`],
    ['DECIMAL', String.raw`[0-9]+\.[0-9]+`],
    ['INTEGER', String.raw`[0-9]+`],
    ['NABLA', String.raw`\\nabla` + END],
    ['PI', String.raw`\\pi` + END],
    ['EULER', 'e'],
    ['PLUS', String.raw`\+`],
    ['MINUS', '-'],
    ['MULTIPLY', String.raw`\*|(?:\\cdot|\\times)` + END],
    ['DIVIDE', '/'],
    ['EQUAL', '='],
    ['CARET', String.raw`\^`],
    ['COMMA', ','],
    ['COLON', ':'],
    ['COMMENT', '%'],
    ['LEFT_PAREN', String.raw`\(`],
    ['RIGHT_PAREN', String.raw`\)`],
    ['LEFT_BRACE', String.raw`\{`],
    ['RIGHT_BRACE', String.raw`\}`],
    ['LEFT_BRACKET', String.raw`\[`],
    ['RIGHT_BRACKET', String.raw`\]`],
    ['LINE_BREAK', String.raw`;|\\\\|\\cr` + END],
    ['BEGIN_ALIGN', String.raw`\\begin\{align\*?\}`],
    ['END_ALIGN', String.raw`\\end\{align\*?\}`],
    ['PARTIAL', String.raw`\\partial` + END],
    ['SQRT_CMD', String.raw`\\sqrt` + END],
    ['FRAC_CMD', String.raw`\\frac` + END],
    ['TRIG_CMD', String.raw`\\(?:sinh|cosh|tanh|sin|cos|tan)` + END],
    ['NLOG_CMD', String.raw`\\(?:ln|log)` + END],
    ['VPHANTOM', String.raw`\\vphantom` + END],
    ['DEFINE_MACRO', 'define' + END],
    ['UPDATE_MACRO', 'update' + END],
    ['PARSE_MACRO', 'parse' + END],
    ['INDEX_KWRD', 'index' + END],
    ['BASIS_KWRD', 'basis' + END],
    ['DERIV_KWRD', 'deriv' + END],
    ['DERIV_TYPE', 'symbolic' + END],
    ['UNDERSCORE', '_'],
    ['DIACRITIC', String.raw`\\(?:hat|tilde|bar)` + END],
    ['SYMMETRY', symmetryPattern],
    ['MATHOP', String.raw`\\mathop` + END],
    ['LETTER', `[a-zA-Z]|(?:${greekPattern})${END}`],
    ['COMMAND', String.raw`\\[a-zA-Z]+`],
];

const COMPILED = MATCHERS.map(([kind, source]) => [kind, new RegExp(source, 'y')] as const);

const SKIPPED = new Set<TokenKind>(['SPACE_DELIM', 'BIGL_DELIM', 'BIGR_DELIM', 'LEFT_DELIM', 'RIGHT_DELIM']);

// ── Lexer ───────────────────────────────────────────────────

export class Lexer {
    sentence = '';
    token: Token | null = null;
    private index = 0;
    private marker = 0;
    private stream: Iterator<Token> = [][Symbol.iterator]();

    initialize(sentence: string, position = 0): void {
        this.sentence = sentence;
        this.index = position;
        this.marker = position;
        this.token = null;
        this.stream = this.tokenize();
    }

    /** Lazily yields the non-skipped tokens from the current offset. */
    *tokenize(): Generator<Token, void, undefined> {
        while (this.index < this.sentence.length) {
            const token = this.match(this.index);
            this.index += token.lexeme.length;
            if (!SKIPPED.has(token.kind)) yield token;
        }
    }

    /** Advances to the next token; `null` at end of input. */
    lex(): Token | null {
        const next = this.stream.next();
        this.token = next.done ? null : next.value;
        return this.token;
    }

    /** Offset of the current token (end of input when there is none). */
    position(): number {
        return this.token ? this.token.position : this.sentence.length;
    }

    mark(): number {
        this.marker = this.position();
        return this.marker;
    }

    /** Rewinds to `position` (the last mark by default) and re-reads the token there. */
    reset(position = this.marker): void {
        this.initialize(this.sentence, position);
        this.lex();
    }

    private match(position: number): Token {
        for (const [kind, regex] of COMPILED) {
            regex.lastIndex = position;
            const found = regex.exec(this.sentence);
            if (found && found[0].length > 0) return { kind, lexeme: found[0], position };
        }
        throw new LexError(`unexpected '${this.sentence[position]}' at position ${position}`,
            this.sentence, position);
    }
}

/** All tokens of `sentence`, in order. */
export function tokenize(sentence: string): Token[] {
    const lexer = new Lexer();
    lexer.initialize(sentence);
    return [...lexer.tokenize()];
}
