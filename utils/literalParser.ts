import { Point } from '../types';

/**
 * Parser for the two literal forms the zone language accepts:
 * a list of coordinate pairs and a triple of numbers.
 * Nothing else is evaluated.
 */

export class LiteralParseError extends Error {
    constructor(message: string, public readonly column: number) {
        super(message);
        this.name = 'LiteralParseError';
    }
}

type Token =
    | { kind: 'number'; value: number; column: number }
    | { kind: 'punct'; value: '(' | ')' | '[' | ']' | ','; column: number }
    | { kind: 'end'; column: number };

const NUMBER_RE = /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;

export const tokenize = (text: string): Token[] => {
    const tokens: Token[] = [];
    let i = 0;
    while (i < text.length) {
        const ch = text[i];
        if (/\s/.test(ch)) {
            i++;
            continue;
        }
        if (ch === '(' || ch === ')' || ch === '[' || ch === ']' || ch === ',') {
            tokens.push({ kind: 'punct', value: ch, column: i });
            i++;
            continue;
        }
        NUMBER_RE.lastIndex = i;
        const m = NUMBER_RE.exec(text);
        if (!m) {
            throw new LiteralParseError(`unexpected character '${ch}'`, i);
        }
        const value = Number(m[0]);
        if (!Number.isFinite(value)) {
            throw new LiteralParseError(`number '${m[0]}' is out of range`, i);
        }
        tokens.push({ kind: 'number', value, column: i });
        i += m[0].length;
    }
    tokens.push({ kind: 'end', column: text.length });
    return tokens;
};

const describeToken = (t: Token): string => {
    if (t.kind === 'end') return 'end of input';
    return `'${t.value}'`;
};

class Cursor {
    private pos = 0;

    constructor(private readonly tokens: Token[]) {}

    peek(): Token {
        return this.tokens[Math.min(this.pos, this.tokens.length - 1)];
    }

    next(): Token {
        const t = this.peek();
        this.pos++;
        return t;
    }

    expect(value: '(' | ')' | '[' | ']' | ','): void {
        const t = this.next();
        if (t.kind !== 'punct' || t.value !== value) {
            throw new LiteralParseError(`expected '${value}' but found ${describeToken(t)}`, t.column);
        }
    }

    accept(value: '(' | ')' | '[' | ']' | ','): boolean {
        const t = this.peek();
        if (t.kind === 'punct' && t.value === value) {
            this.pos++;
            return true;
        }
        return false;
    }

    number(): number {
        const t = this.next();
        if (t.kind !== 'number') {
            throw new LiteralParseError(`expected a number but found ${describeToken(t)}`, t.column);
        }
        return t.value;
    }

    end(): void {
        const t = this.peek();
        if (t.kind !== 'end') {
            throw new LiteralParseError(`unexpected ${describeToken(t)} after literal`, t.column);
        }
    }
}

// A pair is written (x, y) or [x, y]
const parsePair = (cursor: Cursor): Point => {
    const open = cursor.peek();
    const close = open.kind === 'punct' && open.value === '[' ? ']' : ')';
    if (close === ']') cursor.expect('[');
    else cursor.expect('(');

    const x = cursor.number();
    cursor.expect(',');
    const y = cursor.number();
    cursor.accept(',');
    cursor.expect(close);
    return { x, y };
};

/** `[(x1, y1), (x2, y2), ...]` with an optional trailing comma. */
export const parseCoordinateList = (text: string): Point[] => {
    const cursor = new Cursor(tokenize(text));
    cursor.expect('[');
    const points: Point[] = [];
    while (!cursor.accept(']')) {
        points.push(parsePair(cursor));
        if (!cursor.accept(',')) {
            cursor.expect(']');
            break;
        }
    }
    cursor.end();
    return points;
};

/** `(a, b, c, ...)`: every number between the parentheses, any count. */
export const parseNumberTuple = (text: string): number[] => {
    const cursor = new Cursor(tokenize(text));
    cursor.expect('(');
    const values: number[] = [];
    while (!cursor.accept(')')) {
        values.push(cursor.number());
        if (!cursor.accept(',')) {
            cursor.expect(')');
            break;
        }
    }
    cursor.end();
    return values;
};
