import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { toOSPath, toDeclaredPath, toPosixPath, normalizeEntryPath, isValidProjectPath } from '../src/Paths';
import { Version } from '../src/Version';

describe('paths', () => {
	it('converts declared separators to the host ones', () => {
		expect(toOSPath('Src\\App\\App.csproj')).toBe(path.join('Src', 'App', 'App.csproj'));
		expect(toOSPath(undefined)).toBe('');
	});

	it('leaves urls alone', () => {
		expect(toOSPath('http://localhost:8080/site\\')).toBe('http://localhost:8080/site\\');
		expect(toDeclaredPath('http://localhost/site/')).toBe('http://localhost/site/');
	});

	it('writes either separator back as the declared one', () => {
		expect(toDeclaredPath('Src/App\\App.csproj')).toBe('Src\\App\\App.csproj');
		expect(toPosixPath('Src\\App\\App.csproj')).toBe('Src/App/App.csproj');
	});

	it('normalizes only when asked', () => {
		expect(normalizeEntryPath('A\\B.csproj', false)).toBe('A\\B.csproj');
		expect(normalizeEntryPath('A\\B.csproj', true)).toBe(path.join('A', 'B.csproj'));
	});

	it('rejects characters no file path can hold', () => {
		expect(isValidProjectPath('A\\B.csproj')).toBe(true);
		expect(isValidProjectPath('A|B.csproj')).toBe(false);
		expect(isValidProjectPath('A\tB.csproj')).toBe(false);
	});
});

describe('Version', () => {
	it('parses dotted numbers, ignoring trailing words', () => {
		expect(Version.parse('12.00')?.parts).toEqual([12, 0]);
		expect(Version.parse('15.0.27130.2010 VSPRO_PLATFORM')?.toString()).toBe('15.0.27130.2010');
		expect(Version.parse('12')).toBeUndefined();
		expect(Version.parse('12.x')).toBeUndefined();
		expect(Version.parse('')).toBeUndefined();
	});

	it('compares missing parts as zero', () => {
		const v = (s: string) => Version.parse(s) ?? new Version;
		expect(v('17.0').compare(v('17.0.0.0'))).toBe(0);
		expect(v('17.5.1').compare(v('17.10'))).toBeLessThan(0);
		expect(v('12.00').compare(v('11.0'))).toBeGreaterThan(0);
	});
});
