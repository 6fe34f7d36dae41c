import * as insensitive from '@isopodlabs/utilities/insensitive';
import type { Entry } from './Blocks';
import { type Diagnostics, trimQuotes } from './Options';
import { type ProjectReference, parseProjectReferences } from './References';

//-----------------------------------------------------------------------------
//	website properties
//-----------------------------------------------------------------------------

export const COMPILER_NAMESPACE = 'AspNetCompiler';

export interface WebCompilerParameters {
	virtualPath:					string;
	physicalPath:					string;
	targetPath:						string;
	forceOverwrite:					string;
	updateable:						string;
	debug:							string;
	keyFile:						string;
	keyContainer:					string;
	delaySign:						string;
	allowPartiallyTrustedCallers:	string;
	fixedNames:						string;
}

const fields = new Map<string, keyof WebCompilerParameters>([
	['VirtualPath',						'virtualPath'],
	['PhysicalPath',					'physicalPath'],
	['TargetPath',						'targetPath'],
	['ForceOverwrite',					'forceOverwrite'],
	['Updateable',						'updateable'],
	['Debug',							'debug'],
	['KeyFile',							'keyFile'],
	['KeyContainer',					'keyContainer'],
	['DelaySign',						'delaySign'],
	['AllowPartiallyTrustedCallers',	'allowPartiallyTrustedCallers'],
	['FixedNames',						'fixedNames'],
]);

export function emptyParameters(): WebCompilerParameters {
	return {
		virtualPath:					'',
		physicalPath:					'',
		targetPath:						'',
		forceOverwrite:					'',
		updateable:						'',
		debug:							'',
		keyFile:						'',
		keyContainer:					'',
		delaySign:						'',
		allowPartiallyTrustedCallers:	'',
		fixedNames:						'',
	};
}

export interface WebProperties {
	parameters:					Map<string, WebCompilerParameters>;
	references:					ProjectReference[];
	targetFrameworkMoniker?:	string;
}

function unescapeAll(value: string) {
	return value.replace(/%([0-9a-fA-F]{2})/g, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)));
}

/**
 * Decodes a `WebsiteProperties` section.
 * Every `<Config>.<Tool>.<Field>` key gives its configuration a record; only `AspNetCompiler` keys fill it, unassigned fields staying empty.
 * `ProjectReferences` and `TargetFrameworkMoniker` are read as well, and anything else is left to the opaque bag.
 */
export function extractWebProperties(entries: Entry[], quote: string, separator: string, diagnostics: Diagnostics): WebProperties {
	const result: WebProperties = {parameters: new Map, references: []};

	for (const i of entries) {
		const value = i.value ?? '';
		if (insensitive.compare(i.key, 'ProjectReferences') == 0) {
			result.references.push(...parseProjectReferences(value, i.line, quote, separator, diagnostics));

		} else if (insensitive.compare(i.key, 'TargetFrameworkMoniker') == 0) {
			result.targetFrameworkMoniker = unescapeAll(trimQuotes(value, quote));

		} else {
			const dot1 = i.key.indexOf('.');
			const dot2 = i.key.lastIndexOf('.');
			if (dot1 > 0 && dot2 > dot1) {
				const config	= i.key.substring(0, dot1);
				let params		= result.parameters.get(config);
				if (!params)
					result.parameters.set(config, params = emptyParameters());

				const field = i.key.substring(dot1 + 1, dot2) === COMPILER_NAMESPACE ? fields.get(i.key.substring(dot2 + 1)) : undefined;
				if (field)
					params[field] = trimQuotes(value, quote);
			}
		}
	}
	return result;
}
