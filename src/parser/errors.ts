// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Translation Errors
// Located diagnostics for lexing, parsing and tensor semantics
// ─────────────────────────────────────────────────────────────

export type ErrorKind = 'lex' | 'parse' | 'tensor';

/**
 * Base class of every error the translator raises. Errors thrown
 * below the parser start unlocated; the parser attaches the sentence
 * and position of the enclosing structure through {@link LatexError.at}.
 */
export class LatexError extends Error {
    readonly kind: ErrorKind;
    readonly sentence: string;
    readonly position: number;

    constructor(kind: ErrorKind, message: string, sentence = '', position = -1) {
        super(message);
        this.name = 'LatexError';
        this.kind = kind;
        this.sentence = sentence;
        this.position = position;
    }

    get located(): boolean {
        return this.position >= 0;
    }

    /** 1-based line of `position` within `sentence`. */
    get line(): number {
        return this.sentence.slice(0, Math.max(this.position, 0)).split('\n').length;
    }

    /** 0-based column of `position` within its line. */
    get column(): number {
        const before = this.sentence.slice(0, Math.max(this.position, 0));
        return before.length - (before.lastIndexOf('\n') + 1);
    }

    /** The offending line with a caret under `position`. */
    get indicator(): string {
        if (!this.located) return '';
        const text = this.sentence.split('\n')[this.line - 1] ?? '';
        return `${text}\n${' '.repeat(this.column)}^`;
    }

    at(sentence: string, position: number): LatexError {
        if (this.located) return this;
        switch (this.kind) {
            case 'lex': return new LexError(this.message, sentence, position);
            case 'parse': return new ParseError(this.message, sentence, position);
            case 'tensor': return new TensorError(this.message, sentence, position);
        }
    }
}

export class LexError extends LatexError {
    constructor(message: string, sentence = '', position = -1) {
        super('lex', message, sentence, position);
        this.name = 'LexError';
    }
}

export class ParseError extends LatexError {
    constructor(message: string, sentence = '', position = -1) {
        super('parse', message, sentence, position);
        this.name = 'ParseError';
    }
}

export class TensorError extends LatexError {
    constructor(message: string, sentence = '', position = -1) {
        super('tensor', message, sentence, position);
        this.name = 'TensorError';
    }
}

// ── Formatting ──────────────────────────────────────────────

export function formatDiagnostic(error: LatexError): string {
    const header = `${error.name}: ${error.message}`;
    if (!error.located) return header;
    return `${header} (line ${error.line}, column ${error.column})\n${error.indicator}`;
}
