//-----------------------------------------------------------------------------
//	errors
//-----------------------------------------------------------------------------

/** Fatal problem in the solution text: structure, header or nesting */
export class SolutionParseError extends Error {
	constructor(public reason: string, public line = 0, public token = '', public file = '') {
		super(`${file || '<solution>'}(${line}): ${reason}${token ? ` [${token}]` : ''}`);
		this.name = 'SolutionParseError';
	}
}

/** Failure opening or saving a solution through a serializer */
export class SerializerError extends Error {
	constructor(public reason: string, public path: string, cause?: unknown) {
		super(`${path}: ${reason}`, {cause});
		this.name = 'SerializerError';
	}
}

export interface ParseWarning {
	line:		number;
	message:	string;
}
