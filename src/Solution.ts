import * as crypto from 'crypto';
import * as insensitive from '@isopodlabs/utilities/insensitive';
import { Version } from './Version';
import { SolutionParseError, type ParseWarning } from './Errors';
import { type ParseOptions, type ResolvedOptions, resolveOptions, Diagnostics, quote } from './Options';
import { parseBlocks, type RawDocument, type SectionBlock, type SectionKind, type SectionOrder, type Entry, HEADER_PREFIX } from './Blocks';
import { ProjectEntry, VC_TYPE } from './Project';
import { parseDependencies } from './References';
import { extractWebProperties } from './WebProperties';
import { isUrl, isValidProjectPath, toPosixPath } from './Paths';
import {
	type SolutionConfiguration, type ProjectConfiguration, type Fail,
	fullName, parseSolutionConfigurations, parseProjectConfigurationEntries, mapProjectConfigurations, formatProjectConfigurations,
	defaultConfigurationName, defaultPlatformName,
} from './Configurations';

export const DEPENDENCIES_SECTION	= 'ProjectDependencies';
export const WEBSITE_SECTION		= 'WebsiteProperties';
export const SOLUTION_ITEMS_SECTION	= 'SolutionItems';
export const NESTED_SECTION			= 'NestedProjects';
export const SOLUTION_CONFIGS		= 'SolutionConfigurationPlatforms';
export const PROJECT_CONFIGS		= 'ProjectConfigurationPlatforms';

//-----------------------------------------------------------------------------
//	writing
//-----------------------------------------------------------------------------

function write_section(section: SectionBlock, eol: string) {
	const type = section.kind;
	return section.entries.length == 0 ? '' : `\t${type}(${section.name}) = ${section.order}${eol}${section.entries.map(i => i.value === undefined ? `\t\t${i.key}` : `\t\t${i.key} = ${i.value}`).join(eol)}${eol}\tEnd${type}${eol}`;
}

function pairs(entries: [string, string][]): Entry[] {
	return entries.map(([key, value]) => ({key, value, line: 0}));
}

/** Replaces the entries of a named section in place, or appends a new section when there is something to write */
function with_section(sections: SectionBlock[], kind: SectionKind, name: string, order: SectionOrder, entries: Entry[]): SectionBlock[] {
	const i = sections.findIndex(s => s.name === name);
	if (i >= 0)
		return sections.map((s, j) => j === i ? {...s, entries} : s);
	return entries.length ? [...sections, {kind, name, order, entries, line: 0}] : sections;
}

//-----------------------------------------------------------------------------
//	unique names
//-----------------------------------------------------------------------------

function cleanse(name: string) {
	return name.replace(/[%$@;.()']/g, '_');
}

function bareGuid(guid: string) {
	return guid.replace(/^\{|\}$/g, '');
}

function nonDefaultPort(project: ProjectEntry) {
	if (project.isWeb && isUrl(project.relativePath) && URL.canParse(project.relativePath))
		return new URL(project.relativePath).port || undefined;
}

//-----------------------------------------------------------------------------
//	Solution
//-----------------------------------------------------------------------------

export class Solution {
	/** declaration order, whatever the nesting */
	projects:		ProjectEntry[]			= [];
	configurations:	SolutionConfiguration[]	= [];
	globalSections:	SectionBlock[]			= [];
	/** top level `key = value` lines, such as VisualStudioVersion */
	properties:		Entry[]					= [];
	warnings:		ParseWarning[]			= [];
	comments:		string[]				= [];
	filter?:		Set<string>;

	header				= `${HEADER_PREFIX}12.00`;
	formatVersion		= new Version(12, 0);
	productDescription	= '';
	eol					= '\r\n';
	quote				= '"';
	separator			= '|';

	private by_guid = insensitive.Record({} as Record<string, ProjectEntry>);

	constructor(public fullpath = '') {}

	static parse(text: string, options?: ParseOptions) {
		return parseSolution(text, options);
	}

	get visualStudioVersion()			{ return Version.parse(this.property('VisualStudioVersion')); }
	get minimumVisualStudioVersion()	{ return Version.parse(this.property('MinimumVisualStudioVersion')); }
	get visualStudioMajorVersion()		{ return this.visualStudioVersion?.major ?? this.formatVersion.major - 1; }

	property(name: string) {
		return this.properties.find(i => i.key === name)?.value;
	}
	setProperty(name: string, value: string) {
		const entry = this.properties.find(i => i.key === name);
		if (entry)
			entry.value = value;
		else
			this.properties.push({key: name, value, line: 0});
	}

	globalSection(name: string) {
		return this.globalSections.find(i => i.name === name);
	}

	addProject(project: ProjectEntry) {
		if (this.by_guid[project.guid])
			throw new SolutionParseError('Duplicate project identifier', project.line, project.guid, this.fullpath);
		this.by_guid[project.guid] = project;
		this.projects.push(project);
	}

	//---------------------------------
	// lookups
	//---------------------------------

	projectByGuid(guid: string): ProjectEntry | undefined {
		return this.by_guid[guid];
	}
	projectByName(name: string) {
		return this.projects.find(i => i.name === name);
	}
	uniqueNameByGuid(guid: string) {
		return this.projectByGuid(guid)?.uniqueName;
	}
	relativePathByGuid(guid: string) {
		return this.projectByGuid(guid)?.relativePath;
	}

	get childProjects() {
		return this.projects.filter(i => !i.parent);
	}
	childrenOf(parent: ProjectEntry) {
		return this.projects.filter(i => i.parent !== undefined && insensitive.compare(i.parent, parent.guid) == 0);
	}

	//---------------------------------
	// configurations
	//---------------------------------

	defaultConfigurationName() {
		return defaultConfigurationName(this.configurations);
	}
	defaultPlatformName() {
		return defaultPlatformName(this.configurations);
	}

	/** The project's mapping for a solution configuration, or the solution's own names, unbuilt, when it has none */
	projectConfiguration(project: ProjectEntry, solutionConfiguration?: SolutionConfiguration): ProjectConfiguration {
		const sc = solutionConfiguration ?? {Configuration: this.defaultConfigurationName(), Platform: this.defaultPlatformName()};
		const c: ProjectConfiguration | undefined = project.configuration[fullName(sc, this.separator)];
		return c ?? {Configuration: sc.Configuration, Platform: sc.Platform, build: false, deploy: false};
	}

	isBuildable(project: ProjectEntry) {
		return !project.isFolder && Object.keys(project.configuration).length > 0;
	}

	projectShouldBuild(relativePath: string) {
		return !this.filter || this.filter.has(filterKey(relativePath));
	}

	//---------------------------------
	// model assembly
	//---------------------------------

	/** Points children at their parents and rejects anything but a tree of folders */
	resolveNesting(entries: Entry[], fail: Fail) {
		for (const i of entries) {
			if (i.value === undefined)
				throw fail('Invalid nested project entry', i.line, i.key);

			const child = this.projectByGuid(i.key);
			if (!child)
				throw fail(`Nested project '${i.key}' (parent '${i.value}') is not defined`, i.line, i.key);

			const parent = this.projectByGuid(i.value);
			if (!parent)
				throw fail(`Parent project '${i.value}' of '${i.key}' is not defined`, i.line, i.value);

			if (!parent.isFolder)
				throw fail(`Parent project '${parent.name}' is not a solution folder`, i.line, i.value);

			child.parent = parent.guid;
		}

		for (const project of this.projects) {
			const seen = new Set<ProjectEntry>([project]);
			for (let p = this.parentOf(project); p; p = this.parentOf(p)) {
				if (seen.has(p))
					throw fail(`Solution folder '${p.name}' is nested inside itself`, p.line, p.guid);
				seen.add(p);
			}
		}
	}

	parentOf(project: ProjectEntry) {
		return project.parent ? this.projectByGuid(project.parent) : undefined;
	}

	private ancestors(project: ProjectEntry) {
		const result: ProjectEntry[] = [];
		for (let p = this.parentOf(project); p; p = this.parentOf(p))
			result.unshift(p);
		return result;
	}

	/** Sets uniqueName, originalName and displayPath; nesting must already be resolved */
	assignNames(fail: Fail) {
		for (const project of this.projects) {
			const chain				= [...this.ancestors(project), project];
			project.originalName	= chain.map(i => i.name).join('\\');
			project.uniqueName		= chain.map(i => cleanse(i.name)).join('\\');
			project.displayPath		= project.isFolder ? `/${chain.map(i => i.name).join('/')}/` : project.relativePath;
		}

		const by_unique		= new Map<string, ProjectEntry>();
		const by_original	= new Set<string>();

		for (const project of this.projects) {
			let unique = project.uniqueName;

			const port = nonDefaultPort(project);
			if (port && this.projects.some(i => i !== project && insensitive.compare(i.name, project.name) == 0)) {
				project.uniqueName		= unique = `${unique}:${port}`;
				project.originalName	= `${project.originalName}:${port}`;
			}

			const other = by_unique.get(unique.toUpperCase());
			if (other) {
				if (unique !== project.name) {
					project.uniqueName = unique = `${unique}_${bareGuid(project.guid)}`;
				} else if (unique !== other.name) {
					other.uniqueName = `${unique}_${bareGuid(other.guid)}`;
					by_unique.delete(unique.toUpperCase());
					by_unique.set(other.uniqueName.toUpperCase(), other);
				}
			}

			const exists = by_unique.has(unique.toUpperCase());
			if (!exists)
				by_unique.set(unique.toUpperCase(), project);

			const original = project.originalName.toUpperCase();
			if (exists || by_original.has(original))
				throw fail(`Duplicate project name '${exists ? unique : project.name}'`, project.line, project.guid);
			by_original.add(original);
		}
	}

	//---------------------------------
	// legacy text
	//---------------------------------

	private projectSections(project: ProjectEntry) {
		let sections = with_section(project.sections, 'ProjectSection', DEPENDENCIES_SECTION, 'postProject', pairs(project.dependencies.map(i => [i, i])));
		sections = with_section(sections, 'ProjectSection', SOLUTION_ITEMS_SECTION, 'preProject', pairs(project.solutionItems.map(i => [i, i])));
		return sections;
	}

	private globalSectionsToWrite() {
		const configs	= this.configurations.map(i => fullName(i, this.separator));
		const nested	= this.projects.filter(i => i.parent !== undefined).map((i): [string, string] => [i.guid, i.parent ?? '']);

		let sections = with_section(this.globalSections, 'GlobalSection', SOLUTION_CONFIGS, 'preSolution', pairs(configs.map(i => [i, i])));
		sections = with_section(sections, 'GlobalSection', PROJECT_CONFIGS, 'postSolution', pairs(formatProjectConfigurations(this.projects, this.separator)));
		sections = with_section(sections, 'GlobalSection', NESTED_SECTION, 'preSolution', pairs(nested));
		return sections;
	}

	/** The legacy text for this model; reading it back gives the same model */
	format(): string {
		const eol	= this.eol;
		const q		= this.quote;

		let out = eol + this.header + eol;
		if (this.productDescription)
			out += `# ${this.productDescription}${eol}`;

		for (const i of this.properties)
			out += (i.value === undefined ? i.key : `${i.key} = ${i.value}`) + eol;

		for (const p of this.projects) {
			out += `Project(${quote(p.type, q)}) = ${quote(p.name, q)}, ${quote(p.declaredPath, q)}, ${quote(p.guid, q)}${eol}`;
			for (const s of this.projectSections(p))
				out += write_section(s, eol);
			out += 'EndProject' + eol;
		}

		out += 'Global' + eol;
		for (const s of this.globalSectionsToWrite())
			out += write_section(s, eol);
		out += 'EndGlobal' + eol;

		return out;
	}
}

function filterKey(relativePath: string) {
	return toPosixPath(relativePath).toLowerCase();
}

export function setFilter(solution: Solution, projects: string[], fail: Fail) {
	const known = new Set(solution.projects.map(i => filterKey(i.relativePath)));
	for (const i of projects) {
		if (!known.has(filterKey(i)))
			throw fail(`Filtered project '${i}' is not in the solution`, 0, i);
	}
	solution.filter = new Set(projects.map(filterKey));
}

//-----------------------------------------------------------------------------
//	model builder
//-----------------------------------------------------------------------------

export function checkProjectHeader(project: ProjectEntry, fail: Fail) {
	if (!project.guid)
		throw fail('Project identifier is missing', project.line, project.name);
	if (!project.declaredPath)
		throw fail('Project path is empty', project.line, project.name);
	if (!isValidProjectPath(project.declaredPath))
		throw fail('Project path contains invalid characters', project.line, project.declaredPath);
}

/** Fills a project's dependency, web and item data from its sections */
export function readProjectSections(project: ProjectEntry, sections: SectionBlock[], options: ResolvedOptions, diagnostics: Diagnostics) {
	project.sections = sections;
	for (const s of sections) {
		switch (s.name) {
			case DEPENDENCIES_SECTION:
				for (const i of parseDependencies(s.entries, diagnostics))
					project.addDependency(i);
				break;

			case WEBSITE_SECTION: {
				const web = extractWebProperties(s.entries, options.quote, options.separator, diagnostics);
				project.references.push(...web.references);
				for (const [config, params] of web.parameters)
					project.webParameters.set(config, params);
				if (web.targetFrameworkMoniker !== undefined)
					project.targetFrameworkMoniker = web.targetFrameworkMoniker;
				break;
			}

			case SOLUTION_ITEMS_SECTION:
				project.solutionItems.push(...s.entries.map(i => i.key));
				break;
		}
	}
}

export function buildSolution(doc: RawDocument, options: ResolvedOptions, diagnostics: Diagnostics): Solution {
	const fail: Fail = (reason, line, token) => new SolutionParseError(reason, line, token, options.path);
	const solution = new Solution(options.path);

	solution.header				= doc.header;
	solution.formatVersion		= doc.formatVersion;
	solution.productDescription	= doc.productDescription;
	solution.properties			= doc.properties;
	solution.comments			= doc.comments;
	solution.eol				= doc.eol;
	solution.quote				= options.quote;
	solution.separator			= options.separator;
	solution.warnings			= diagnostics.warnings;

	for (const block of doc.projects) {
		const h			= block.header;
		const name		= h.name || `EmptyProjectName.${crypto.randomUUID()}`;
		const project	= new ProjectEntry(h.type, name, h.path, h.guid, options.normalizePaths, block.line);
		checkProjectHeader(project, fail);

		if (project.kind === 'unknown' && h.type.toUpperCase() === VC_TYPE)
			diagnostics.warn(block.line, `Project '${name}' is an old-style C++ project and needs upgrading`);

		readProjectSections(project, block.sections, options, diagnostics);
		solution.addProject(project);
	}

	solution.globalSections = doc.globalSections;

	const configs = solution.globalSection(SOLUTION_CONFIGS);
	if (configs)
		solution.configurations = parseSolutionConfigurations(configs, options.separator, fail);

	const project_configs = solution.globalSection(PROJECT_CONFIGS);
	if (project_configs)
		mapProjectConfigurations(solution.projects, solution.configurations, parseProjectConfigurationEntries(project_configs, fail), options.separator, fail);

	solution.resolveNesting(solution.globalSection(NESTED_SECTION)?.entries ?? [], fail);
	solution.assignNames(fail);
	return solution;
}

export function parseSolution(text: string, options?: ParseOptions): Solution {
	const resolved		= resolveOptions(options);
	const diagnostics	= new Diagnostics(resolved);
	return buildSolution(parseBlocks(text, resolved, diagnostics), resolved, diagnostics);
}

export function formatSolution(solution: Solution) {
	return solution.format();
}
