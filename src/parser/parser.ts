// ─────────────────────────────────────────────────────────────
// Tensorex  ·  LaTeX → Expression Parser
// Recursive descent over the tensor dialect, executing each
// structure against the session as soon as it is read
// ─────────────────────────────────────────────────────────────

import { Lexer } from './lexer';
import type { Token, TokenKind } from './lexer';
import { LatexError, LexError, ParseError, TensorError } from './errors';
import { expandShorthand } from './shorthand';
import { mk, ZERO } from '../core/expr';
import type { Expr, FuncName, Index, IndexLabel, Position, Sym, Indexed, Derivative } from '../core/expr';
import { add, sub, mul, div, pow, neg, func, derivative } from '../core/algebra';
import { differentiate } from '../core/calculus';
import type { DerivativeMode, Diacritic, Session } from '../engine/session';
import { assign, evaluate } from '../engine/einstein';
import type { Target } from '../engine/einstein';
import { baseOf, declare, ensureDerivativeTensor } from '../engine/tensor';
import { diacriticOf, registerMetric } from '../engine/metric';
import { christoffelEquation, covariantEquation, covariantSymbol } from '../engine/synthesizer';
import type { Nabla } from '../engine/synthesizer';

export interface ParseResult {
    /** Names bound by this call, in binding order. */
    bindings: Map<string, Expr>;
    errors: LatexError[];
}

interface TensorRef extends Target {
    indices: Index[];
    position: number;
}

type Location = 'LHS' | 'RHS';

const FACTOR_START = new Set<TokenKind>([
    'LEFT_PAREN', 'PARTIAL', 'LETTER', 'RATIONAL', 'DECIMAL', 'INTEGER', 'NABLA', 'PI',
    'EULER', 'DIACRITIC', 'MATHOP', 'COMMAND', 'SQRT_CMD', 'FRAC_CMD', 'TRIG_CMD',
    'NLOG_CMD', 'VPHANTOM',
]);

const TRIG: Record<string, readonly [FuncName, FuncName]> = {
    '\\sin': ['sin', 'asin'], '\\cos': ['cos', 'acos'], '\\tan': ['tan', 'atan'],
    '\\sinh': ['sinh', 'asinh'], '\\cosh': ['cosh', 'acosh'], '\\tanh': ['tanh', 'atanh'],
};

const CHRISTOFFEL = /^Gamma(hat|bar|tilde)?UDD$/;

/** Tokens recovery resumes at, at the top level and inside `align`. */
const STRUCTURE_END: ReadonlySet<TokenKind> = new Set<TokenKind>(['LINE_BREAK']);
const ROW_END: ReadonlySet<TokenKind> = new Set<TokenKind>(['LINE_BREAK', 'END_ALIGN']);

function strip(lexeme: string): string {
    return lexeme.startsWith('\\') ? lexeme.slice(1) : lexeme;
}

function toDiacritic(name: string): Diacritic {
    switch (name) {
        case 'hat': case 'bar': case 'tilde': return name;
        default: return '';
    }
}

function rationalLiteral(lexeme: string): Expr {
    const [num, den] = (lexeme.match(/[0-9]+/g) ?? []).map(digits => BigInt(digits));
    return mk.rational(num, den);
}

// ── Parser ──────────────────────────────────────────────────

export class LatexParser {
    readonly bindings = new Map<string, Expr>();
    readonly errors: LatexError[] = [];
    private readonly lexer = new Lexer();
    private readonly session: Session;
    private readonly recover: boolean;

    constructor(session: Session, recover = false) {
        this.session = session;
        this.recover = recover;
    }

    /** Parses `sentence`, collecting errors instead of throwing them. */
    run(sentence: string): ParseResult {
        try {
            this.parse(sentence);
        } catch (error) {
            if (!(error instanceof LatexError)) throw error;
            this.errors.push(error);
        }
        return { bindings: this.bindings, errors: this.errors };
    }

    /** ROOT → STRUCTURE { LINE_BREAK STRUCTURE }* */
    parse(sentence: string): void {
        this.lexer.initialize(expandShorthand(sentence));
        this.guarded(() => {
            this.lexer.lex();
            this.structure();
        });
        while (this.peek()) {
            this.guarded(() => {
                if (this.match('LINE_BREAK')) {
                    if (this.peek() && !this.check('LINE_BREAK')) this.structure();
                } else if (this.check('COMMENT')) {
                    this.structure();
                } else {
                    throw this.unexpected();
                }
            });
        }
    }

    /** Translates a standalone expression; it may not carry free indices. */
    parseExpression(sentence: string): Expr {
        this.lexer.initialize(expandShorthand(sentence));
        this.lexer.lex();
        const expr = this.expression();
        if (this.peek()) throw this.unexpected();
        return this.locate(0, () => evaluate(this.session, expr));
    }

    // ── Token helpers ───────────────────────────────────────

    private peek(): Token | null {
        return this.lexer.token;
    }

    private current(): Token {
        const token = this.lexer.token;
        if (!token) throw this.unexpected();
        return token;
    }

    private advance(): Token {
        const token = this.current();
        this.lexer.lex();
        return token;
    }

    private check(kind: TokenKind): boolean {
        return this.lexer.token?.kind === kind;
    }

    private match(kind: TokenKind): boolean {
        if (!this.check(kind)) return false;
        this.lexer.lex();
        return true;
    }

    private expect(kind: TokenKind): Token {
        if (!this.check(kind)) throw this.expected(kind);
        return this.advance();
    }

    private expected(kind: string): ParseError {
        const position = this.lexer.position();
        return new ParseError(`expected token ${kind} at position ${position}`, this.lexer.sentence, position);
    }

    private unexpected(): ParseError {
        const position = this.lexer.position();
        const token = this.lexer.token;
        const found = token ? `'${token.lexeme}'` : 'end of input';
        return new ParseError(`unexpected ${found} at position ${position}`, this.lexer.sentence, position);
    }

    /** Runs `step`, attaching `position` to any unlocated error it raises. */
    private locate<T>(position: number, step: () => T): T {
        try {
            return step();
        } catch (error) {
            if (error instanceof LatexError) throw error.at(this.lexer.sentence, position);
            throw error;
        }
    }

    // ── Recovery ────────────────────────────────────────────

    /** In recovery mode, reports an error of `step` and skips to the next token in `stops`. */
    private guarded(step: () => void, stops = STRUCTURE_END): void {
        if (!this.recover) {
            step();
            return;
        }
        try {
            step();
        } catch (error) {
            if (!(error instanceof LatexError)) throw error;
            this.errors.push(error);
            this.session.logger.warn(`[Parser] skipping structure: ${error.message}`);
            this.skipTo(error, stops);
        }
    }

    private skipTo(error: LatexError, stops: ReadonlySet<TokenKind>): void {
        const { sentence } = this.lexer;
        const failedHere = error instanceof LexError && error.sentence === sentence;
        this.lexer.initialize(sentence, failedHere ? error.position + 1 : this.lexer.position());
        for (;;) {
            try {
                const token = this.lexer.lex();
                if (!token || stops.has(token.kind)) return;
            } catch (failure) {
                if (!(failure instanceof LexError)) throw failure;
                this.lexer.initialize(sentence, failure.position + 1);
            }
        }
    }

    // ── Structures ──────────────────────────────────────────

    /** STRUCTURE → CONFIG | ENVIRONMENT | ASSIGNMENT */
    private structure(): void {
        if (this.check('COMMENT')) this.config();
        else if (this.check('BEGIN_ALIGN')) this.environment();
        else this.assignment();
    }

    private environment(): void {
        this.expect('BEGIN_ALIGN');
        this.guarded(() => this.assignment(), ROW_END);
        while (this.match('LINE_BREAK')) {
            if (this.check('END_ALIGN')) break;
            this.guarded(() => this.assignment(), ROW_END);
        }
        this.expect('END_ALIGN');
    }

    /** ASSIGNMENT → (TENSOR | COVDRV) '=' EXPRESSION */
    private assignment(): void {
        const start = this.lexer.position();
        const target = this.startsCovariant() ? this.covdrv('LHS') : this.tensorRef('LHS');
        this.expect('EQUAL');
        const rhs = this.expression();
        const source = this.lexer.sentence.slice(start, this.lexer.position()).trim();
        this.locate(start, () => assign(this.session, target, rhs, this.bindings));
        if (target.indices.length) this.session.equations.set(target.symbol, source);
    }

    /** Translates a generated sentence in this session, keeping its bindings. */
    private nested(sentence: string): void {
        const parser = new LatexParser(this.session);
        parser.parse(sentence);
        for (const [name, value] of parser.bindings) this.bindings.set(name, value);
    }

    // ── Directives ──────────────────────────────────────────

    /** CONFIG → '%' ( DEFINE | UPDATE | PARSE ) */
    private config(): void {
        this.expect('COMMENT');
        if (this.match('PARSE_MACRO')) this.assignment();
        else if (this.check('DEFINE_MACRO')) this.define();
        else if (this.check('UPDATE_MACRO')) this.update();
        else throw this.unexpected();
    }

    private define(): void {
        this.expect('DEFINE_MACRO');
        do {
            if (this.check('BASIS_KWRD')) this.basis();
            else if (this.check('INDEX_KWRD')) this.indexRange();
            else if (this.match('DERIV_KWRD')) this.session.derivative = this.derivativeMode();
            else this.declaration();
        } while (this.match('COMMA'));
    }

    private declaration(): void {
        const position = this.lexer.position();
        const keyword = this.check('SYMMETRY') ? this.advance().lexeme : null;
        const symbol = this.symbolName();
        let dimension: number | null = null;
        if (this.match('LEFT_PAREN')) {
            dimension = Number(this.expect('INTEGER').lexeme);
            this.expect('RIGHT_PAREN');
        }
        this.locate(position, () => {
            declare(this.session, { symbol, keyword, dimension }, this.bindings);
            if (keyword === 'metric') registerMetric(this.session, symbol, this.bindings);
        });
    }

    private basis(): void {
        this.expect('BASIS_KWRD');
        this.expect('LEFT_BRACKET');
        const basis: string[] = [];
        do {
            const token = this.expect('LETTER');
            const name = strip(token.lexeme);
            if (basis.includes(name)) {
                throw new ParseError(`duplicate basis symbol '${name}' at position ${token.position}`,
                    this.lexer.sentence, token.position);
            }
            basis.push(name);
        } while (this.match('COMMA'));
        this.expect('RIGHT_BRACKET');
        this.session.basis = basis;
    }

    /** RANGE → ( LETTER | '[' LETTER '-' LETTER ']' ) '=' INTEGER ':' INTEGER */
    private indexRange(): void {
        this.expect('INDEX_KWRD');
        let labels: string[];
        if (this.match('LEFT_BRACKET')) {
            const first = this.rangeLetter();
            this.expect('MINUS');
            const last = this.rangeLetter();
            this.expect('RIGHT_BRACKET');
            labels = [];
            for (let code = first.charCodeAt(0); code <= last.charCodeAt(0); code++) {
                labels.push(String.fromCharCode(code));
            }
        } else {
            labels = [strip(this.expect('LETTER').lexeme)];
        }
        this.expect('EQUAL');
        const start = Number(this.expect('INTEGER').lexeme);
        this.expect('COLON');
        const stop = Number(this.expect('INTEGER').lexeme);
        for (const label of labels) this.session.ranges.set(label, { start, stop: stop + 1 });
    }

    private rangeLetter(): string {
        const token = this.check('EULER') ? this.advance() : this.expect('LETTER');
        if (token.lexeme.length !== 1) {
            throw new ParseError(`unexpected '${token.lexeme}' at position ${token.position}`,
                this.lexer.sentence, token.position);
        }
        return token.lexeme;
    }

    private update(): void {
        this.expect('UPDATE_MACRO');
        const position = this.lexer.position();
        const metric = this.check('SYMMETRY') && this.current().lexeme === 'metric';
        if (metric) this.advance();
        const symbol = this.symbolName();
        this.locate(position, () => {
            if (!this.session.tensors.has(symbol)) throw new TensorError(`cannot update undefined tensor '${symbol}'`);
            if (metric) {
                registerMetric(this.session, symbol, this.bindings);
                return;
            }
            const source = this.session.equations.get(symbol);
            if (source === undefined) throw new TensorError(`no equation defines '${symbol}'`);
            this.nested(source);
        });
    }

    /** DERIV_TYPE → 'symbolic' | '_d' */
    private derivativeMode(): DerivativeMode {
        if (this.match('DERIV_TYPE')) return 'symbolic';
        if (this.match('UNDERSCORE')) {
            const token = this.peek();
            if (token && token.kind === 'LETTER' && token.lexeme === 'd') {
                this.advance();
                return '_d';
            }
        }
        throw this.expected('DERIV_TYPE');
    }

    private phantomMode(): DerivativeMode {
        this.expect('VPHANTOM');
        this.expect('LEFT_BRACE');
        const mode = this.derivativeMode();
        this.expect('RIGHT_BRACE');
        return mode;
    }

    // ── Expressions ─────────────────────────────────────────

    /** EXPRESSION → TERM { ('+'|'-') TERM }* */
    private expression(): Expr {
        let expr = this.term();
        for (;;) {
            if (this.match('PLUS')) expr = add(expr, this.term());
            else if (this.match('MINUS')) expr = sub(expr, this.term());
            else return expr;
        }
    }

    /** TERM → FACTOR { [ '/' ] FACTOR }* */
    private term(): Expr {
        let expr = this.factor();
        for (;;) {
            if (this.match('DIVIDE')) expr = div(expr, this.factor());
            else if (this.match('MULTIPLY')) expr = mul(expr, this.factor());
            else if (this.startsFactor()) expr = mul(expr, this.factor());
            else return expr;
        }
    }

    private startsFactor(): boolean {
        const token = this.peek();
        return token !== null && FACTOR_START.has(token.kind);
    }

    /** FACTOR → (BASE | EULER) { '^' EXPONENT }*, right associative */
    private factor(): Expr {
        if (this.match('MINUS')) return neg(this.factor());
        const stack: Expr[] = [this.match('EULER') ? mk.e() : this.base()];
        while (this.match('CARET')) stack.push(this.exponent());
        let expr = stack[stack.length - 1];
        for (let i = stack.length - 2; i >= 0; i--) expr = pow(stack[i], expr);
        return expr;
    }

    /** BASE → [ '-' ] ( ATOM | '(' EXPRESSION ')' ) */
    private base(): Expr {
        if (this.match('MINUS')) return neg(this.base());
        if (this.match('LEFT_PAREN')) {
            const expr = this.expression();
            this.expect('RIGHT_PAREN');
            return expr;
        }
        return this.atom();
    }

    /** EXPONENT → BASE | '{' BASE '}' | '{{' BASE '}}' */
    private exponent(): Expr {
        if (!this.match('LEFT_BRACE')) return this.base();
        const doubled = this.match('LEFT_BRACE');
        const expr = this.expression();
        this.expect('RIGHT_BRACE');
        if (doubled) this.expect('RIGHT_BRACE');
        return expr;
    }

    /** ATOM → NUMBER | TENSOR | COMMAND | OPERATOR */
    private atom(): Expr {
        const token = this.current();
        switch (token.kind) {
            case 'RATIONAL':
                this.advance();
                return rationalLiteral(token.lexeme);
            case 'DECIMAL':
                this.advance();
                return mk.float(Number(token.lexeme));
            case 'INTEGER':
                this.advance();
                return mk.int(BigInt(token.lexeme));
            case 'PI':
                this.advance();
                return mk.pi();
            case 'SQRT_CMD':
                return this.sqrt();
            case 'FRAC_CMD':
                return this.frac();
            case 'NLOG_CMD':
                return this.nlog();
            case 'TRIG_CMD':
                return this.trig();
            case 'PARTIAL':
                return this.pardrv();
            case 'NABLA':
                return this.covariantAtom();
            case 'VPHANTOM':
                return this.phantomOperator();
            case 'DIACRITIC':
                return this.startsCovariant() ? this.covariantAtom() : this.tensorAtom();
            case 'LETTER':
            case 'MATHOP':
                return this.tensorAtom();
            case 'COMMAND':
                throw new ParseError(`unsupported command '${token.lexeme}' at position ${token.position}`,
                    this.lexer.sentence, token.position);
            default:
                throw this.unexpected();
        }
    }

    // ── Commands ────────────────────────────────────────────

    /** SQRT → '\sqrt' [ '[' INTEGER ']' ] '{' EXPRESSION '}' */
    private sqrt(): Expr {
        this.expect('SQRT_CMD');
        let degree = 2;
        if (this.match('LEFT_BRACKET')) {
            const token = this.expect('INTEGER');
            degree = Number(token.lexeme);
            if (degree === 0) {
                throw new ParseError(`unexpected '${token.lexeme}' at position ${token.position}`,
                    this.lexer.sentence, token.position);
            }
            this.expect('RIGHT_BRACKET');
        }
        this.expect('LEFT_BRACE');
        const radicand = this.expression();
        this.expect('RIGHT_BRACE');
        return pow(radicand, mk.rational(1, degree));
    }

    /** FRAC → '\frac' '{' EXPRESSION '}' '{' EXPRESSION '}' */
    private frac(): Expr {
        this.expect('FRAC_CMD');
        this.expect('LEFT_BRACE');
        const numerator = this.expression();
        this.expect('RIGHT_BRACE');
        this.expect('LEFT_BRACE');
        const denominator = this.expression();
        this.expect('RIGHT_BRACE');
        return div(numerator, denominator);
    }

    /** NLOG → ('\ln'|'\log') [ '_' INTEGER ] ARGUMENT; `\log` defaults to base 10 */
    private nlog(): Expr {
        const token = this.expect('NLOG_CMD');
        let base: number | null = token.lexeme === '\\ln' ? null : 10;
        if (this.match('UNDERSCORE')) base = this.integerArgument();
        const log = func('log', this.functionArgument());
        return base === null ? log : div(log, func('log', mk.int(base)));
    }

    /** TRIG → TRIG_CMD [ '^' INTEGER ] ARGUMENT; a power of -1 is the inverse function */
    private trig(): Expr {
        const token = this.expect('TRIG_CMD');
        const [name, inverse] = TRIG[token.lexeme];
        const power = this.match('CARET') ? this.integerArgument() : null;
        const arg = this.functionArgument();
        if (power === -1) return func(inverse, arg);
        const value = func(name, arg);
        return power === null ? value : pow(value, mk.int(power));
    }

    /** INTEGER | '{' ['-'] INTEGER '}' */
    private integerArgument(): number {
        const braced = this.match('LEFT_BRACE');
        const sign = this.match('MINUS') ? -1 : 1;
        const value = sign * Number(this.expect('INTEGER').lexeme);
        if (braced) this.expect('RIGHT_BRACE');
        return value;
    }

    /** LETTER | INTEGER | '(' EXPRESSION ')' */
    private functionArgument(): Expr {
        const token = this.current();
        switch (token.kind) {
            case 'LEFT_PAREN': {
                this.advance();
                const expr = this.expression();
                this.expect('RIGHT_PAREN');
                return expr;
            }
            case 'INTEGER':
                this.advance();
                return mk.int(BigInt(token.lexeme));
            case 'PI':
                this.advance();
                return mk.pi();
            case 'LETTER':
            case 'DIACRITIC':
            case 'MATHOP':
                return this.tensorAtom();
            default:
                throw this.unexpected();
        }
    }

    // ── Operators ───────────────────────────────────────────

    /** Dispatches `\vphantom{…}` to the operator that follows it. */
    private phantomOperator(): Expr {
        const mark = this.lexer.mark();
        this.phantomMode();
        const partial = this.check('PARTIAL');
        this.lexer.reset(mark);
        return partial ? this.pardrv() : this.covariantAtom();
    }

    /** PARDRV → [ VPHANTOM ] { '\partial' [ '^' INTEGER ] '_' LETTER }+ ( TENSOR | '(' EXPRESSION ')' ) */
    private pardrv(): Expr {
        const position = this.lexer.position();
        let mode = this.check('VPHANTOM') ? this.phantomMode() : this.session.derivative;
        const wrt: string[] = [];
        do {
            this.expect('PARTIAL');
            const order = this.match('CARET') ? Number(this.expect('INTEGER').lexeme) : 1;
            this.expect('UNDERSCORE');
            const label = strip(this.expect('LETTER').lexeme);
            for (let i = 0; i < order; i++) wrt.push(label);
        } while (this.check('PARTIAL'));
        if (wrt.every(label => this.session.isCoordinate(label))) mode = 'symbolic';

        let operand: Expr;
        if (this.match('LEFT_PAREN')) {
            operand = this.expression();
            this.expect('RIGHT_PAREN');
        } else {
            operand = this.tensorAtom();
        }
        if (mode === 'symbolic') return derivative(operand, wrt);
        return this.locate(position, () => wrt.reduce(
            (expr, label) => differentiate(expr, leaf => this.derivativeLeaf(leaf, label)), operand));
    }

    /** Partial derivative of an atom as a component of its derivative tensor. */
    private derivativeLeaf(leaf: Sym | Indexed | Derivative, label: string): Expr {
        if (leaf.tag === 'Derivative') return derivative(leaf, [label]);
        if (leaf.tag === 'Symbol') {
            if (this.session.constants.has(leaf.name)) return ZERO;
            const symbol = ensureDerivativeTensor(this.session, leaf.name, this.bindings);
            return mk.indexed(symbol, [{ label, position: 'D' }]);
        }
        const symbol = ensureDerivativeTensor(this.session, leaf.symbol, this.bindings);
        return mk.indexed(symbol, [...leaf.indices, { label, position: 'D' }]);
    }

    private startsCovariant(): boolean {
        if (this.check('NABLA')) return true;
        if (!this.check('DIACRITIC')) return false;
        const mark = this.lexer.mark();
        this.advance();
        const nabla = this.match('LEFT_BRACE') && this.check('NABLA');
        this.lexer.reset(mark);
        return nabla;
    }

    private covariantAtom(): Expr {
        const ref = this.covdrv('RHS');
        return mk.indexed(ref.symbol, ref.indices);
    }

    /** COVDRV → [ VPHANTOM ] { ('\nabla' | DIACRITIC '{' '\nabla' '}') ('^'|'_') LETTER }+ TENSOR */
    private covdrv(location: Location): TensorRef {
        const position = this.lexer.position();
        const mode = this.check('VPHANTOM') ? this.phantomMode() : this.session.derivative;
        const nablas: Nabla[] = [];
        let diacritic: Diacritic | null = null;
        do {
            const token = this.current();
            let current: Diacritic = '';
            if (token.kind === 'DIACRITIC') {
                this.advance();
                this.expect('LEFT_BRACE');
                this.expect('NABLA');
                this.expect('RIGHT_BRACE');
                current = toDiacritic(strip(token.lexeme));
            } else {
                this.expect('NABLA');
            }
            if (diacritic !== null && diacritic !== current) {
                throw new ParseError(`mixed diacritics in covariant derivative at position ${token.position}`,
                    this.lexer.sentence, token.position);
            }
            diacritic = current;
            let slot: Position = 'U';
            if (!this.match('CARET')) {
                this.expect('UNDERSCORE');
                slot = 'D';
            }
            nablas.push({ label: strip(this.expect('LETTER').lexeme), position: slot });
        } while (this.startsCovariant());

        const parenthesized = this.match('LEFT_PAREN');
        const tensor = this.tensorRef('LHS');
        if (parenthesized) this.expect('RIGHT_PAREN');

        const context = diacritic ?? '';
        const symbol = covariantSymbol(tensor.symbol, context, nablas);
        const indices = [...tensor.indices, ...[...nablas].reverse().map(({ label, position }) => ({ label, position }))];
        if (location === 'RHS' && !this.session.tensors.has(symbol)) {
            if (tensor.indices.length && !this.session.tensors.has(tensor.symbol)) {
                throw new TensorError(`undefined tensor '${tensor.symbol}'`, this.lexer.sentence, tensor.position);
            }
            const metric = this.locate(position, () => this.session.metricContext(context));
            this.session.logger.info(`[Synthesizer] computing '${symbol}'`);
            this.nested(covariantEquation({
                tensor: tensor.symbol, nablas, diacritic: context, mode, context: metric, exclude: this.session.basis,
            }));
        }
        return { symbol, indices, position };
    }

    // ── Tensors ─────────────────────────────────────────────

    private tensorAtom(): Expr {
        const ref = this.tensorRef('RHS');
        if (ref.indices.length === 0) return mk.sym(ref.symbol);
        if (!this.session.tensors.has(ref.symbol)) {
            if (!CHRISTOFFEL.test(ref.symbol)) {
                throw new TensorError(`undefined tensor '${ref.symbol}'`, this.lexer.sentence, ref.position);
            }
            const diacritic = diacriticOf(baseOf(ref.symbol));
            const metric = this.locate(ref.position, () => this.session.metricContext(diacritic));
            this.session.logger.info(`[Synthesizer] computing '${ref.symbol}'`);
            this.nested(christoffelEquation(metric, this.session.derivative, this.session.basis));
        }
        return mk.indexed(ref.symbol, ref.indices);
    }

    /** TENSOR → SYMBOL [ '_' LOWER_INDEX | '^' UPPER_INDEX [ '_' LOWER_INDEX ] ] */
    private tensorRef(location: Location): TensorRef {
        const position = this.lexer.position();
        const base = this.symbol();
        const indices: Index[] = [];
        let derivatives: string[] = [];
        const scalar: TensorRef = { symbol: base, indices: [], position };

        if (this.match('UNDERSCORE')) {
            const lower = this.lowerIndex();
            indices.push(...lower.labels.map(label => ({ label, position: 'D' as const })));
            derivatives = lower.derivatives;
        } else if (this.check('CARET')) {
            const caret = this.lexer.mark();
            this.advance();
            // `x^{{n}}` is always a power
            const doubled = this.match('LEFT_BRACE') && this.check('LEFT_BRACE');
            this.lexer.reset(caret);
            if (doubled) return scalar;
            this.advance();
            const upper = this.upperIndex();
            if (location === 'RHS' && upper.every(label => typeof label === 'number')
                && !this.indexable(base, upper.length)) {
                this.lexer.reset(caret);
                return scalar;
            }
            indices.push(...upper.map(label => ({ label, position: 'U' as const })));
            if (this.match('UNDERSCORE')) {
                const lower = this.lowerIndex();
                indices.push(...lower.labels.map(label => ({ label, position: 'D' as const })));
                derivatives = lower.derivatives;
            }
        }

        let symbol = base + indices.map(index => index.position).join('');
        for (const label of derivatives) {
            symbol = this.locate(position, () => ensureDerivativeTensor(this.session, symbol, this.bindings));
            indices.push({ label, position: 'D' });
        }
        return { symbol, indices, position };
    }

    /** Whether a numeric superscript on `base` reads as an index rather than a power. */
    private indexable(base: string, rank: number): boolean {
        return /^Gamma(hat|bar|tilde)?$/.test(base) || this.session.hasTensorPrefix(base + 'U'.repeat(rank));
    }

    /** SYMBOL → LETTER | DIACRITIC '{' LETTER '}' | '\mathop' '{' LETTER { LETTER | INTEGER | '_' }* '}' */
    private symbol(): string {
        const token = this.current();
        switch (token.kind) {
            case 'LETTER':
            case 'EULER':
                this.advance();
                return strip(token.lexeme);
            case 'DIACRITIC': {
                this.advance();
                this.expect('LEFT_BRACE');
                const letter = this.expect('LETTER');
                this.expect('RIGHT_BRACE');
                return strip(letter.lexeme) + strip(token.lexeme);
            }
            case 'MATHOP': {
                this.advance();
                this.expect('LEFT_BRACE');
                let name = strip(this.expect('LETTER').lexeme);
                while (this.check('LETTER') || this.check('EULER') || this.check('INTEGER') || this.check('UNDERSCORE')) {
                    name += strip(this.advance().lexeme);
                }
                this.expect('RIGHT_BRACE');
                return name;
            }
            default:
                throw this.unexpected();
        }
    }

    /** SYMBOL+ as written in directives: `gUU`, `\hat{g}DD`, `\epsilon DDD` */
    private symbolName(): string {
        let name = this.symbol();
        while (this.check('LETTER') || this.check('EULER') || this.check('DIACRITIC') || this.check('MATHOP')) {
            name += this.symbol();
        }
        return name;
    }

    /** A letter label, or one concrete index per digit of an integer. */
    private indexLabels(): IndexLabel[] {
        const token = this.current();
        if (token.kind === 'LETTER') {
            this.advance();
            return [strip(token.lexeme)];
        }
        if (token.kind === 'INTEGER') {
            this.advance();
            return [...token.lexeme].map(Number);
        }
        throw this.unexpected();
    }

    /** LOWER_INDEX → LETTER | INTEGER | '{' { LETTER | INTEGER }* [ ',' { LETTER }+ ] '}' */
    private lowerIndex(): { labels: IndexLabel[]; derivatives: string[] } {
        if (!this.match('LEFT_BRACE')) return { labels: this.indexLabels(), derivatives: [] };
        const labels: IndexLabel[] = [];
        const derivatives: string[] = [];
        while (this.check('LETTER') || this.check('INTEGER')) labels.push(...this.indexLabels());
        if (this.match('COMMA')) {
            do derivatives.push(strip(this.expect('LETTER').lexeme));
            while (this.check('LETTER'));
        }
        this.expect('RIGHT_BRACE');
        return { labels, derivatives };
    }

    /** UPPER_INDEX → LETTER | INTEGER | '{' { LETTER | INTEGER }+ '}' */
    private upperIndex(): IndexLabel[] {
        const braced = this.match('LEFT_BRACE');
        if (!this.startsLabel()) throw this.notAnIndex();
        const labels = this.indexLabels();
        if (!braced) return labels;
        while (this.startsLabel()) labels.push(...this.indexLabels());
        if (!this.check('RIGHT_BRACE')) throw this.notAnIndex();
        this.advance();
        return labels;
    }

    private startsLabel(): boolean {
        return this.check('LETTER') || this.check('INTEGER');
    }

    /** A superscript that is no index list; powers of symbols are written `x^{{…}}`. */
    private notAnIndex(): ParseError {
        const position = this.lexer.position();
        const token = this.lexer.token;
        const found = token ? `'${token.lexeme}'` : 'end of input';
        return new ParseError(`unexpected ${found} in superscript at position ${position} (write a power as ^{{...}})`,
            this.lexer.sentence, position);
    }
}
