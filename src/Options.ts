import type { ParseWarning } from './Errors';

//-----------------------------------------------------------------------------
//	parse options
//-----------------------------------------------------------------------------

export interface ParseOptions {
	/** quote character around project header fields (default `"`) */
	quote?:				string;
	/** separator of `config|platform` and `guid|name` pairs (default `|`) */
	separator?:			string;
	/** rewrite declared project paths with the host separator */
	normalizePaths?:	boolean;
	/** source path, used in diagnostics */
	path?:				string;
	log?:				(message: string) => void;
}

export type ResolvedOptions = Required<ParseOptions>;

function checkChar(name: string, c: string) {
	if (c.length !== 1 || /[\s=]/.test(c))
		throw new Error(`${name} must be a single non-blank character other than '=', got '${c}'`);
	return c;
}

export function resolveOptions(options: ParseOptions = {}): ResolvedOptions {
	return {
		quote:			checkChar('quote', options.quote ?? '"'),
		separator:		checkChar('separator', options.separator ?? '|'),
		normalizePaths:	options.normalizePaths ?? false,
		path:			options.path ?? '',
		log:			options.log ?? console.log,
	};
}

export function escapeRe(s: string) {
	return s.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

/** Strips one pair of surrounding quotes, undoubling any escaped quote inside */
export function trimQuotes(value: string, quote: string) {
	if (value.length >= 2 && value[0] === quote && value[value.length - 1] === quote)
		return value.slice(1, -1).split(quote + quote).join(quote);
	return value;
}

export function quote(value: string, q: string) {
	return q + value.split(q).join(q + q) + q;
}

/** Recoverable problems: logged, and kept for the model */
export class Diagnostics {
	readonly warnings: ParseWarning[] = [];
	constructor(private options: ResolvedOptions) {}

	warn(line: number, message: string) {
		this.warnings.push({line, message});
		this.options.log(`Warning: ${this.options.path || '<solution>'}(${line}): ${message}`);
	}
}
