import * as path from 'path';
import * as crypto from 'crypto';
import * as xml from '@isopodlabs/xml';
import type { SolutionSerializer, LoadOptions, SaveOptions } from './Bridge';
import { Version } from './Version';
import { SolutionParseError, SerializerError } from './Errors';
import { type ResolvedOptions, resolveOptions, Diagnostics } from './Options';
import { type Entry, type SectionBlock, type SectionKind, type SectionOrder, HEADER_PREFIX, isSectionOrder } from './Blocks';
import { ProjectEntry, FOLDER_TYPE, typeFromExt } from './Project';
import { type Fail, type SolutionConfiguration, fullName } from './Configurations';
import { toDeclaredPath, toPosixPath } from './Paths';
import { xml_load, xml_save } from './Files';
import {
	Solution, checkProjectHeader, readProjectSections,
	DEPENDENCIES_SECTION, SOLUTION_ITEMS_SECTION, NESTED_SECTION, SOLUTION_CONFIGS, PROJECT_CONFIGS,
} from './Solution';

// configuration names inside the xml are always `Config|Platform`
const SEPARATOR = '|';

const regenerated_project_sections	= [DEPENDENCIES_SECTION, SOLUTION_ITEMS_SECTION];
const regenerated_global_sections	= [SOLUTION_CONFIGS, PROJECT_CONFIGS, NESTED_SECTION];

function attrs(values: Record<string, string | undefined>): Record<string, string> {
	const result: Record<string, string> = {};
	for (const [k, v] of Object.entries(values)) {
		if (v !== undefined)
			result[k] = v;
	}
	return result;
}

function childElements(element: xml.Element, name: string) {
	return element.allElements().filter(i => i.name === name);
}

//-----------------------------------------------------------------------------
//	model to xml
//-----------------------------------------------------------------------------

// values go in the text, since raw ones carry their own quotes; a key with no `=` is marked Bare
function propertyElement(entry: Entry) {
	return entry.value === undefined
		? new xml.Element('Property', {Name: entry.key, Bare: 'true'})
		: new xml.Element('Property', {Name: entry.key}, entry.value ? [entry.value] : []);
}

function propertiesElement(section: SectionBlock, scope?: string) {
	return new xml.Element('Properties', attrs({Name: section.name, Order: section.order, Scope: scope}), section.entries.map(propertyElement));
}

function projectElement(solution: Solution, project: ProjectEntry) {
	const element = project.isFolder
		? new xml.Element('Folder', attrs({Name: project.name, Path: toPosixPath(project.declaredPath), Id: project.guid, Parent: project.parent}))
		: new xml.Element('Project', attrs({Path: toPosixPath(project.declaredPath), Type: project.type, Id: project.guid, DisplayName: project.name, Parent: project.parent}));

	for (const i of project.dependencies)
		element.add(new xml.Element('BuildDependency', {Project: i}));

	for (const c of solution.configurations) {
		const pc = project.configuration[fullName(c, solution.separator)];
		if (pc) {
			element.add(new xml.Element('Configuration', {
				Solution:	fullName(c, SEPARATOR),
				Project:	pc.Platform ? fullName(pc, SEPARATOR) : pc.Configuration,
				Build:		String(pc.build),
				Deploy:		String(pc.deploy),
			}));
		}
	}

	for (const i of project.solutionItems)
		element.add(new xml.Element('File', {Path: toPosixPath(i)}));

	for (const s of project.sections) {
		if (!regenerated_project_sections.includes(s.name))
			element.add(propertiesElement(s));
	}
	return element;
}

export function toElement(solution: Solution): xml.Element {
	const version = solution.header.startsWith(HEADER_PREFIX) ? solution.header.slice(HEADER_PREFIX.length).trim() : solution.formatVersion.toString();
	const root = new xml.Element('Solution', attrs({FormatVersion: version, Description: solution.productDescription || undefined}));

	if (solution.properties.length)
		root.add(new xml.Element('Properties', {Scope: 'Solution'}, solution.properties.map(propertyElement)));

	root.add(new xml.Element('Configurations', {}, solution.configurations.map(c => new xml.Element('Configuration', {Name: fullName(c, SEPARATOR)}))));

	for (const p of solution.projects)
		root.add(projectElement(solution, p));

	for (const s of solution.globalSections) {
		if (!regenerated_global_sections.includes(s.name))
			root.add(propertiesElement(s, 'Global'));
	}
	return root;
}

//-----------------------------------------------------------------------------
//	xml to model
//-----------------------------------------------------------------------------

function readEntries(element: xml.Element): Entry[] {
	return childElements(element, 'Property').map(i => ({
		key:	i.attributes.Name ?? '',
		value:	i.attributes.Bare === 'true' ? undefined : i.firstText() || '',
		line:	0,
	}));
}

function readSection(element: xml.Element, kind: SectionKind, order: SectionOrder, fail: Fail): SectionBlock {
	const name	= element.attributes.Name ?? '';
	const when	= element.attributes.Order ?? order;
	if (!name)
		throw fail('Section id missing', 0, element.name);
	if (!isSectionOrder(when))
		throw fail('Invalid section type', 0, when);
	return {kind, name, order: when, entries: readEntries(element), line: 0};
}

function splitConfiguration(name: string, fail: Fail): SolutionConfiguration {
	const parts = name.split(SEPARATOR);
	if (parts.length !== 2)
		throw fail('Invalid solution configuration entry', 0, name);
	return {Configuration: parts[0], Platform: parts[1]};
}

function readProject(element: xml.Element, options: ResolvedOptions, diagnostics: Diagnostics, fail: Fail) {
	const a			= element.attributes;
	const isFolder	= element.name === 'Folder';
	const filepath	= a.Path ?? '';
	const ext		= path.extname(filepath);
	const type		= isFolder ? FOLDER_TYPE : a.Type ?? typeFromExt(ext) ?? '';
	const name		= (isFolder ? a.Name : a.DisplayName) ?? path.basename(filepath, ext);
	const guid		= a.Id ?? `{${crypto.randomUUID().toUpperCase()}}`;

	const project = new ProjectEntry(type, name, toDeclaredPath(filepath), guid, options.normalizePaths);
	checkProjectHeader(project, fail);

	readProjectSections(project, childElements(element, 'Properties').map(i => readSection(i, 'ProjectSection', 'preProject', fail)), options, diagnostics);

	for (const i of childElements(element, 'BuildDependency')) {
		if (i.attributes.Project)
			project.addDependency(i.attributes.Project);
		else
			diagnostics.warn(0, `Build dependency of '${name}' names no project`);
	}

	for (const i of childElements(element, 'Configuration')) {
		const sc	= splitConfiguration(i.attributes.Solution ?? '', fail);
		const pc	= (i.attributes.Project ?? '').split(SEPARATOR);
		if (pc.length > 2)
			throw fail('Invalid project configuration entry', 0, i.attributes.Project ?? '');
		project.setProjectConfiguration(fullName(sc, options.separator), {
			Configuration:	pc[0],
			Platform:		pc[1] ?? '',
			build:			i.attributes.Build === 'true',
			deploy:			i.attributes.Deploy === 'true',
		});
	}

	for (const i of childElements(element, 'File'))
		project.solutionItems.push(toDeclaredPath(i.attributes.Path ?? ''));

	return project;
}

export function fromElement(root: xml.Element, options: ResolvedOptions, diagnostics: Diagnostics): Solution {
	const fail: Fail	= (reason, line, token) => new SolutionParseError(reason, line, token, options.path);
	const solution		= new Solution(options.path);
	const version		= root.attributes.FormatVersion ?? '12.00';

	solution.header				= HEADER_PREFIX + version;
	solution.formatVersion		= Version.parse(version) ?? solution.formatVersion;
	solution.productDescription	= root.attributes.Description ?? '';
	solution.quote				= options.quote;
	solution.separator			= options.separator;
	solution.warnings			= diagnostics.warnings;

	const nesting: Entry[] = [];

	for (const e of root.allElements()) {
		switch (e.name) {
			case 'Configurations':
				solution.configurations = childElements(e, 'Configuration').map(i => splitConfiguration(i.attributes.Name ?? '', fail));
				break;

			case 'Properties':
				if (e.attributes.Scope === 'Solution')
					solution.properties.push(...readEntries(e));
				else
					solution.globalSections.push(readSection(e, 'GlobalSection', 'preSolution', fail));
				break;

			case 'Folder':
			case 'Project': {
				const project = readProject(e, options, diagnostics, fail);
				if (e.attributes.Parent)
					nesting.push({key: project.guid, value: e.attributes.Parent, line: 0});
				solution.addProject(project);
				break;
			}
		}
	}

	solution.resolveNesting(nesting, fail);
	solution.assignNames(fail);
	return solution;
}

//-----------------------------------------------------------------------------
//	serializer
//-----------------------------------------------------------------------------

export class XmlSolutionSerializer implements SolutionSerializer {
	readonly format		= 'structured';
	readonly extensions	= ['.slnx'];

	sniff(content: string) {
		return /^\s*(<\?xml[^>]*>\s*)?<Solution[\s>/]/.test(content.replace(/^\uFEFF/, ''));
	}

	async open(file: string, options: LoadOptions = {}) {
		const resolved	= resolveOptions({...options, path: file});
		const root		= (await xml_load(file, options.signal)).firstElement();
		if (!root || root.name !== 'Solution')
			throw new SerializerError('No Solution element', file);
		return fromElement(root, resolved, new Diagnostics(resolved));
	}

	async save(file: string, solution: Solution, options: SaveOptions = {}) {
		return xml_save(file, toElement(solution), options.signal);
	}
}
