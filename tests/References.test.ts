import { describe, it, expect, vi } from 'vitest';
import { parseDependencies, parseProjectReferences } from '../src/References';
import { resolveOptions, Diagnostics } from '../src/Options';

function diagnostics(log = vi.fn()) {
	return new Diagnostics(resolveOptions({log}));
}

describe('parseProjectReferences', () => {
	it('keeps identifiers in order, with the names after the separator', () => {
		const diag	= diagnostics();
		const refs	= parseProjectReferences('"{A}|Lib1.dll;{B}|Lib2.dll;"', 1, '"', '|', diag);

		expect(refs.map(i => i.guid)).toEqual(['{A}', '{B}']);
		expect(refs).toEqual([{guid: '{A}', name: 'Lib1.dll'}, {guid: '{B}', name: 'Lib2.dll'}]);
		expect(diag.warnings).toEqual([]);
	});

	it('skips pieces of file names that contain semicolons, with a warning each', () => {
		const log	= vi.fn();
		const diag	= diagnostics(log);
		const refs	= parseProjectReferences('"{A}|CSCla;ssLibra;ry1.dll;{B}|Lib2.dll;"', 7, '"', '|', diag);

		expect(refs).toEqual([{guid: '{A}', name: 'CSCla'}, {guid: '{B}', name: 'Lib2.dll'}]);
		expect(diag.warnings).toEqual([
			{line: 7, message: "Project reference 'ssLibra' has no '|'"},
			{line: 7, message: "Project reference 'ry1.dll' has no '|'"},
		]);
		expect(log).toHaveBeenCalledWith("Warning: <solution>(7): Project reference 'ssLibra' has no '|'");
	});

	it('skips entries without a braced identifier', () => {
		const diag	= diagnostics();
		const refs	= parseProjectReferences('Lib|Lib.dll', 3, '"', '|', diag);

		expect(refs).toEqual([]);
		expect(diag.warnings).toEqual([{line: 3, message: "Project reference 'Lib|Lib.dll' has no identifier"}]);
	});

	it('uses the separator it is given', () => {
		const refs = parseProjectReferences("'{A}:Lib.dll'", 1, "'", ':', diagnostics());

		expect(refs).toEqual([{guid: '{A}', name: 'Lib.dll'}]);
	});
});

describe('parseDependencies', () => {
	it('keeps declaration order and duplicates', () => {
		const deps = parseDependencies([
			{key: '{A}', value: '{A}', line: 1},
			{key: '{B}', value: '{B}', line: 2},
			{key: '{A}', value: '{A}', line: 3},
		], diagnostics());

		expect(deps).toEqual(['{A}', '{B}', '{A}']);
	});

	it('drops malformed entries with a warning', () => {
		const diag = diagnostics();
		const deps = parseDependencies([
			{key: '{A}', line: 1},
			{key: '{B} {C}', value: 'x', line: 2},
			{key: '{D}', value: '{D}', line: 3},
		], diag);

		expect(deps).toEqual(['{D}']);
		expect(diag.warnings).toEqual([
			{line: 1, message: "Malformed project dependency '{A}'"},
			{line: 2, message: "Malformed project dependency '{B} {C}'"},
		]);
	});
});
