import * as path from 'path';

//-----------------------------------------------------------------------------
//	path separators
//-----------------------------------------------------------------------------

const url_re = /^[a-z][a-z0-9+.-]*:\/\//i;

export function isUrl(input: string) {
	return url_re.test(input);
}

/** Declared (backslash) separators to the host's */
export function toOSPath(input: string | undefined): string {
	if (!input)
		return '';
	if (isUrl(input))
		return input.trim();
	return input
		.replace(/\\/g, path.sep)
		.trim();
}

/** Any separators to the given one, as the legacy text expects them */
export function toDeclaredPath(input: string, separator = '\\'): string {
	if (isUrl(input))
		return input;
	return input.replace(/[\\/]/g, separator);
}

export function toPosixPath(input: string): string {
	return toDeclaredPath(input, '/');
}

export function normalizeEntryPath(declared: string, normalize: boolean) {
	return normalize ? toOSPath(declared) : declared;
}

// characters that can never appear in a project path
const invalid_path_re = /[<>|"\x00-\x1f]/;

export function isValidProjectPath(input: string) {
	return !invalid_path_re.test(input);
}
