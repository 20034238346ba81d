// ─────────────────────────────────────────────────────────────
// Tensorex  ·  Session & Directive Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect, vi } from 'vitest';
import { createSession, parse, parseExpr, toString, formatDiagnostic } from '../index';
import type { Expr } from '../core/expr';
import { LexError, ParseError, TensorError } from '../parser/errors';

function show(bindings: ReadonlyMap<string, Expr>, name: string): string {
    const value = bindings.get(name);
    if (value === undefined) throw new Error(`'${name}' is not bound`);
    return toString(value);
}

const logger = () => ({ warn: vi.fn(), info: vi.fn() });

describe('parse', () => {
    it('binds scalars and keeps them in the session', () => {
        const session = createSession();
        const { bindings, errors } = parse('x = 2; y = x^{{2}} + 1', session);
        expect(errors).toEqual([]);
        expect([...bindings.keys()]).toEqual(['x', 'y']);
        expect(show(bindings, 'y')).toBe('1 + x^2');
        expect(session.namespace.has('y')).toBe(true);
    });

    it('translates align environments', () => {
        const { bindings, errors } = parse('\\begin{align} a &= 1 \\\\ b &= 2 \\\\ \\end{align}');
        expect(errors).toEqual([]);
        expect(show(bindings, 'a')).toBe('1');
        expect(show(bindings, 'b')).toBe('2');
    });

    it('executes inline assignments after % parse', () => {
        const { bindings } = parse('% parse x = 3');
        expect(show(bindings, 'x')).toBe('3');
    });

    it('stops at the first error by default', () => {
        const { bindings, errors } = parse('x = 1; y = \\command; z = 3');
        expect(errors).toHaveLength(1);
        expect(bindings.has('x')).toBe(true);
        expect(bindings.has('z')).toBe(false);
    });
});

describe('directives', () => {
    it('declares constants without a dimension', () => {
        const session = createSession();
        const { bindings, errors } = parse('% define const c; E = m c^{{2}}', session);
        expect(errors).toEqual([]);
        expect(session.constants.has('c')).toBe(true);
        expect(show(bindings, 'E')).toBe('c^2*m');
    });

    it('requires a dimension for other declarations', () => {
        const { errors } = parse('% define nosym vU');
        expect(errors[0]).toBeInstanceOf(TensorError);
        expect(errors[0].message).toBe('dimension only omittable for constant');
    });

    it('rejects inconsistent dimensions', () => {
        const { errors } = parse('% define nosym vU (2), nosym wU (3)');
        expect(errors[0].message).toBe('inconsistent tensor dimension');
    });

    it('rejects a metric that is not rank 2', () => {
        const { errors } = parse('% define metric gDDD (3)');
        expect(errors[0].message).toBe('cannot invert tensor of rank 3');
    });

    it('computes the inverse and determinant of a metric', () => {
        const { bindings, errors } = parse('% define metric gDD (2)');
        expect(errors).toEqual([]);
        expect(show(bindings, 'gdet')).toBe('gDD00*gDD11 - gDD01^2');
        expect(show(bindings, 'gUU01')).toBe(show(bindings, 'gUU10'));
    });

    it('rejects duplicate basis symbols', () => {
        const { errors } = parse('% define basis [x, y, x]');
        expect(errors[0]).toBeInstanceOf(ParseError);
        expect(errors[0].message).toBe("duplicate basis symbol 'x' at position 22");
    });

    it('defines inclusive index ranges for letter spans', () => {
        const session = createSession();
        parse('% define index [i-k] = 1:3', session);
        expect(session.rangeOf('j')).toEqual({ start: 1, stop: 4 });
        expect(session.ranges.has('l')).toBe(false);
    });

    it('switches the default derivative mode', () => {
        const session = createSession();
        parse('% define deriv _d', session);
        expect(session.derivative).toBe('_d');
        parse('% define deriv symbolic', session);
        expect(session.derivative).toBe('symbolic');
    });

    it('re-runs the defining equation of a tensor on update', () => {
        const session = createSession();
        const { errors } = parse('% define nosym uU (2); w^a = 2 u^a; u^0 = 5; % update wU', session);
        expect(errors).toEqual([]);
        expect(show(session.namespace, 'wU0')).toBe('10');
        expect(show(session.namespace, 'wU1')).toBe('2*uU1');
    });

    it('cannot update an undefined tensor', () => {
        const { errors } = parse('% update wU');
        expect(errors[0]).toBeInstanceOf(TensorError);
        expect(errors[0].message).toBe("cannot update undefined tensor 'wU'");
    });

    it('cannot update a tensor without an equation', () => {
        const { errors } = parse('% define nosym vU (2); % update vU');
        expect(errors[0].message).toBe("no equation defines 'vU'");
    });
});

describe('session options', () => {
    it('skips a failing structure when continuing on error', () => {
        const log = logger();
        const session = createSession({ continueOnError: true, logger: log });
        const { bindings, errors } = parse('x = \\command{y}; z = 2', session);
        expect(errors).toHaveLength(1);
        expect(errors[0].message).toBe("unsupported command '\\command' at position 4");
        expect(show(bindings, 'z')).toBe('2');
        expect(log.warn).toHaveBeenCalledWith("[Parser] skipping structure: unsupported command '\\command' at position 4");
    });

    it('skips a stray token between structures', () => {
        const session = createSession({ continueOnError: true, logger: logger() });
        const { bindings, errors } = parse('x = 1 ); y = 2', session);
        expect(errors.map(error => error.message)).toEqual(["unexpected ')' at position 6"]);
        expect(show(bindings, 'x')).toBe('1');
        expect(show(bindings, 'y')).toBe('2');
    });

    it('skips a failing row of an align environment', () => {
        const session = createSession({ continueOnError: true, logger: logger() });
        const { bindings, errors } = parse(
            '\\begin{align} a &= \\command{x} \\\\ b &= 2 \\end{align}; c = 3', session);
        expect(errors.map(error => error.message)).toEqual(["unsupported command '\\command' at position 19"]);
        expect([...bindings.keys()]).toEqual(['b', 'c']);
    });

    it('skips a failing last row up to the end of the environment', () => {
        const session = createSession({ continueOnError: true, logger: logger() });
        const { bindings, errors } = parse(
            '\\begin{align} a &= 1 \\\\ b &= \\command \\end{align}; c = 3', session);
        expect(errors).toHaveLength(1);
        expect([...bindings.keys()]).toEqual(['a', 'c']);
    });

    it('resumes after a lexing error', () => {
        const session = createSession({ continueOnError: true, logger: logger() });
        const { bindings, errors } = parse('x = 1 # 2; y = 3', session);
        expect(errors[0]).toBeInstanceOf(LexError);
        expect(show(bindings, 'y')).toBe('3');
    });

    it('warns when a declaration overrides a name', () => {
        const log = logger();
        const session = createSession({ logger: log });
        parse('% define nosym vU (2); % define nosym vU (2)', session);
        expect(log.warn).toHaveBeenCalledTimes(1);
        expect(log.warn).toHaveBeenCalledWith("[Namespace] overriding 'vU'");
    });

    it('stays silent about redefinitions when asked', () => {
        const log = logger();
        const session = createSession({ quietRedefinition: true, logger: log });
        parse('% define nosym vU (2); % define nosym vU (2)', session);
        expect(log.warn).not.toHaveBeenCalled();
    });

    it('forgets everything on clear', () => {
        const session = createSession();
        parse('% define nosym vU (2), basis [x]', session);
        session.clear();
        expect(session.namespace.size).toBe(0);
        expect(session.basis).toEqual([]);
        expect(session.dimension).toBeNull();
    });
});

describe('diagnostics', () => {
    it('locates an error by line and column', () => {
        const { errors } = parse('x = 1;\ny = 1 # 2');
        const [error] = errors;
        expect(error).toBeInstanceOf(LexError);
        expect(error.line).toBe(2);
        expect(error.column).toBe(6);
        expect(formatDiagnostic(error)).toBe(
            "LexError: unexpected '#' at position 13 (line 2, column 6)\ny = 1 # 2\n      ^");
    });

    it('formats unlocated errors without an indicator', () => {
        expect(formatDiagnostic(new TensorError('undefined metric'))).toBe('TensorError: undefined metric');
    });

    it('returns errors as values from parseExpr', () => {
        const result = parseExpr('\\frac{1}');
        expect(result.ok).toBe(false);
        if (!result.ok) expect(result.error.kind).toBe('parse');
    });
});
