import { describe, it, expect } from 'vitest';
import { extractWebProperties, emptyParameters } from '../src/WebProperties';
import { resolveOptions, Diagnostics } from '../src/Options';
import type { Entry } from '../src/Blocks';

function extract(entries: [string, string][]) {
	const diagnostics = new Diagnostics(resolveOptions({log: () => {}}));
	return extractWebProperties(entries.map(([key, value], i): Entry => ({key, value, line: i + 1})), '"', '|', diagnostics);
}

describe('extractWebProperties', () => {
	it('fills one record per configuration, leaving unassigned fields empty', () => {
		const web = extract([
			['Debug.AspNetCompiler.VirtualPath',		'"/site"'],
			['Debug.AspNetCompiler.ForceOverwrite',		'"true"'],
			['Release.AspNetCompiler.Bogus',			'"x"'],
			['AspNetCompiler.VirtualPath',				'"/none"'],
			['Debug.Other.VirtualPath',					'"/other"'],
		]);

		expect([...web.parameters.keys()]).toEqual(['Debug', 'Release']);
		expect(web.parameters.get('Debug')).toEqual({...emptyParameters(), virtualPath: '/site', forceOverwrite: 'true'});
		expect(web.parameters.get('Release')).toEqual(emptyParameters());
		expect(web.parameters.get('Debug')?.keyFile).toBe('');
	});

	it('gives a configuration a record for keys of any tool', () => {
		const web = extract([
			['Profile.Other.VirtualPath',	'"/other"'],
			['VWDPort',						'"5000"'],
		]);

		expect([...web.parameters.keys()]).toEqual(['Profile']);
		expect(web.parameters.get('Profile')).toEqual(emptyParameters());
	});

	it('matches field names exactly', () => {
		const web = extract([['Debug.AspNetCompiler.virtualpath', '"/site"']]);

		expect(web.parameters.get('Debug')?.virtualPath).toBe('');
	});

	it('reads all eleven fields', () => {
		const web = extract([
			['Debug.AspNetCompiler.VirtualPath',					'"/v"'],
			['Debug.AspNetCompiler.PhysicalPath',					'"p\\"'],
			['Debug.AspNetCompiler.TargetPath',						'"t"'],
			['Debug.AspNetCompiler.ForceOverwrite',					'"true"'],
			['Debug.AspNetCompiler.Updateable',						'"true"'],
			['Debug.AspNetCompiler.Debug',							'"True"'],
			['Debug.AspNetCompiler.KeyFile',						'"k.snk"'],
			['Debug.AspNetCompiler.KeyContainer',					'"kc"'],
			['Debug.AspNetCompiler.DelaySign',						'"false"'],
			['Debug.AspNetCompiler.AllowPartiallyTrustedCallers',	'"false"'],
			['Debug.AspNetCompiler.FixedNames',						'"false"'],
		]);

		expect(web.parameters.get('Debug')).toEqual({
			virtualPath:					'/v',
			physicalPath:					'p\\',
			targetPath:						't',
			forceOverwrite:					'true',
			updateable:						'true',
			debug:							'True',
			keyFile:						'k.snk',
			keyContainer:					'kc',
			delaySign:						'false',
			allowPartiallyTrustedCallers:	'false',
			fixedNames:						'false',
		});
	});

	it('reads references and the unescaped framework moniker', () => {
		const web = extract([
			['ProjectReferences',		'"{A}|Lib1.dll;{B}|Lib2.dll;"'],
			['TargetFrameworkMoniker',	'".NETFramework,Version%3Dv4.0"'],
		]);

		expect(web.references.map(i => i.guid)).toEqual(['{A}', '{B}']);
		expect(web.targetFrameworkMoniker).toBe('.NETFramework,Version=v4.0');
		expect(web.parameters.size).toBe(0);
	});
});
