/**
 * Errors raised while building or querying a zone table.
 * Construction errors carry the 1-based source line they were raised on.
 */
export class ZoneError extends Error {
    constructor(message: string, public readonly line?: number) {
        super(line === undefined ? message : `Line ${line}: ${message}`);
        this.name = 'ZoneError';
    }
}

/** The line is not `name = expression`, or the operation is not `left OP right`. */
export class ZoneSyntaxError extends ZoneError {
    constructor(message: string, line: number) {
        super(message, line);
        this.name = 'ZoneSyntaxError';
    }
}

/** Malformed polygon or circle literal. */
export class ShapeError extends ZoneError {
    constructor(message: string, line: number) {
        super(message, line);
        this.name = 'ShapeError';
    }
}

export class ZoneReferenceError extends ZoneError {
    constructor(public readonly zone: string, line: number) {
        super(`unknown zone '${zone}' referenced`, line);
        this.name = 'ZoneReferenceError';
    }
}

export class EmptyResultError extends ZoneError {
    constructor(public readonly zone: string, line: number) {
        super(`resulting zone '${zone}' is empty`, line);
        this.name = 'EmptyResultError';
    }
}

export class DuplicateNameError extends ZoneError {
    constructor(public readonly zone: string, line: number, public readonly firstLine: number) {
        super(`zone '${zone}' is already defined on line ${firstLine}`, line);
        this.name = 'DuplicateNameError';
    }
}

export class ZoneNotFoundError extends ZoneError {
    constructor(public readonly zone: string) {
        super(`zone '${zone}' not found`);
        this.name = 'ZoneNotFoundError';
    }
}

export class ZoneConfigError extends ZoneError {
    constructor(message: string) {
        super(message);
        this.name = 'ZoneConfigError';
    }
}
