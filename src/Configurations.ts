import * as insensitive from '@isopodlabs/utilities/insensitive';
import type { SectionBlock } from './Blocks';
import type { ProjectEntry } from './Project';
import type { SolutionParseError } from './Errors';

//-----------------------------------------------------------------------------
//	configurations
//-----------------------------------------------------------------------------

export interface SolutionConfiguration {
	Configuration:	string,
	Platform:		string,
}

export interface ProjectConfiguration {
	Configuration:	string,
	Platform:		string,
	build:			boolean,
	deploy:			boolean
}

export type Fail = (reason: string, line: number, token: string) => SolutionParseError;

export function fullName(config: SolutionConfiguration, separator = '|') {
	return `${config.Configuration}${separator}${config.Platform}`;
}

/** `Debug|Any CPU = Debug|Any CPU` lines */
export function parseSolutionConfigurations(section: SectionBlock, separator: string, fail: Fail): SolutionConfiguration[] {
	const result: SolutionConfiguration[] = [];
	for (const i of section.entries) {
		const line = `${i.key} = ${i.value ?? ''}`;
		if (i.value === undefined || i.value.includes('='))
			throw fail('Invalid solution configuration entry', i.line, line);

		if (insensitive.compare(i.key, 'DESCRIPTION') == 0)
			continue;

		if (i.key !== i.value)
			throw fail('Invalid solution configuration entry', i.line, line);

		const parts = i.key.split(separator);
		if (parts.length !== 2)
			throw fail('Invalid solution configuration entry', i.line, line);

		result.push({Configuration: parts[0], Platform: parts[1]});
	}
	return result;
}

/** Raw `{guid}.Config|Platform.ActiveCfg = Config|Platform` lines, keyed case-insensitively */
export function parseProjectConfigurationEntries(section: SectionBlock, fail: Fail): Record<string, string> {
	const entries = insensitive.Record({} as Record<string, string>);
	for (const i of section.entries) {
		if (i.value === undefined || i.value.includes('='))
			throw fail('Invalid project configuration entry', i.line, `${i.key} = ${i.value ?? ''}`);
		entries[i.key] = i.value;
	}
	return entries;
}

/**
 * Looks up every (project, solution configuration) pair by constructing its key, since '.' may appear inside configuration names.
 * `ActiveCfg` alone maps the project without building it; no `ActiveCfg` leaves the project out of that configuration.
 */
export function mapProjectConfigurations(projects: ProjectEntry[], configurations: SolutionConfiguration[], entries: Record<string, string>, separator: string, fail: Fail) {
	for (const project of projects) {
		if (project.isFolder)
			continue;

		for (const c of configurations) {
			const name		= fullName(c, separator);
			const key		= `${project.guid}.${name}`;
			const active	= entries[`${key}.ActiveCfg`];
			if (active === undefined)
				continue;

			const parts = active.split(separator);
			if (parts.length > 2)
				throw fail('Invalid project configuration entry', 0, `${key}.ActiveCfg = ${active}`);

			project.setProjectConfiguration(name, {
				Configuration:	parts[0],
				Platform:		parts[1] ?? '',
				build:			entries[`${key}.Build.0`] !== undefined,
				deploy:			entries[`${key}.Deploy.0`] !== undefined,
			});
		}
	}
}

export function formatProjectConfigurations(projects: ProjectEntry[], separator: string): [string, string][] {
	const result: [string, string][] = [];
	for (const project of projects) {
		for (const [name, c] of Object.entries(project.configuration)) {
			const value = c.Platform ? `${c.Configuration}${separator}${c.Platform}` : c.Configuration;
			result.push([`${project.guid}.${name}.ActiveCfg`, value]);
			if (c.build)
				result.push([`${project.guid}.${name}.Build.0`, value]);
			if (c.deploy)
				result.push([`${project.guid}.${name}.Deploy.0`, value]);
		}
	}
	return result;
}

//-----------------------------------------------------------------------------
//	defaults
//-----------------------------------------------------------------------------

export function defaultConfigurationName(configurations: SolutionConfiguration[]) {
	return configurations.find(i => insensitive.compare(i.Configuration, 'Debug') == 0)?.Configuration
		?? configurations[0]?.Configuration
		?? '';
}

export function defaultPlatformName(configurations: SolutionConfiguration[]) {
	return configurations.find(i => insensitive.compare(i.Platform, 'Mixed Platforms') == 0)?.Platform
		?? configurations.find(i => insensitive.compare(i.Platform, 'Any CPU') == 0)?.Platform
		?? configurations[0]?.Platform
		?? '';
}
