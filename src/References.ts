import type { Entry } from './Blocks';
import { type Diagnostics, trimQuotes } from './Options';

//-----------------------------------------------------------------------------
//	dependencies and website references
//-----------------------------------------------------------------------------

export interface ProjectReference {
	guid:	string;
	name:	string;
}

// either a bare token, or one braced identifier
const identifier_re = /^(?:\{[^{}]+\}|[^{}\s]+)$/;

export function isIdentifier(s: string) {
	return identifier_re.test(s);
}

/**
 * Entries of a `ProjectDependencies` section (`{guid} = {guid}`) in order, duplicates kept.
 * Entries that do not name an identifier are dropped with a warning.
 */
export function parseDependencies(entries: Entry[], diagnostics: Diagnostics): string[] {
	const result: string[] = [];
	for (const i of entries) {
		if (i.value === undefined || !isIdentifier(i.key)) {
			diagnostics.warn(i.line, `Malformed project dependency '${i.key}'`);
			continue;
		}
		result.push(i.key);
	}
	return result;
}

/**
 * A website `ProjectReferences` value: `"{guid}|name;{guid}|name;"`.
 * Entries without a separator or without a braced identifier are dropped with a warning.
 */
export function parseProjectReferences(value: string, line: number, quote: string, separator: string, diagnostics: Diagnostics): ProjectReference[] {
	const result: ProjectReference[] = [];

	for (const entry of trimQuotes(value.trim(), quote).split(';')) {
		if (!entry.trim())
			continue;

		const bar = entry.indexOf(separator);
		if (bar === -1) {
			// file names may contain ';', so this is usually the tail of one
			diagnostics.warn(line, `Project reference '${entry}' has no '${separator}'`);
			continue;
		}

		const open	= entry.indexOf('{');
		const close	= open === -1 ? -1 : entry.indexOf('}', open);
		if (close === -1 || open > bar) {
			diagnostics.warn(line, `Project reference '${entry}' has no identifier`);
			continue;
		}

		result.push({guid: entry.substring(open, close + 1), name: entry.substring(bar + 1)});
	}
	return result;
}
