import { Version } from './Version';
import { LineScanner } from './Scanner';
import { SolutionParseError } from './Errors';
import { type ResolvedOptions, type Diagnostics, escapeRe } from './Options';

//-----------------------------------------------------------------------------
//	raw blocks
//-----------------------------------------------------------------------------

export const HEADER_PREFIX		= 'Microsoft Visual Studio Solution File, Format Version ';
export const MIN_FORMAT_VERSION	= 7;
export const MAX_FORMAT_VERSION	= 12;

export type SectionOrder = 'preProject' | 'postProject' | 'preSolution' | 'postSolution';
export type SectionKind = 'ProjectSection' | 'GlobalSection';

const section_orders: readonly string[] = ['preProject', 'postProject', 'preSolution', 'postSolution'];

export function isSectionOrder(s: string): s is SectionOrder {
	return section_orders.includes(s);
}

/** One `key = value` line; a line without `=` has no value */
export interface Entry {
	key:	string;
	value?:	string;
	line:	number;
}

export interface SectionBlock {
	kind:		SectionKind;
	name:		string;
	order:		SectionOrder;
	entries:	Entry[];
	line:		number;
}

export interface ProjectHeader {
	type:	string;
	name:	string;
	path:	string;
	guid:	string;
}

export interface ProjectBlock {
	kind:		'Project';
	header:		ProjectHeader;
	sections:	SectionBlock[];
	line:		number;
}

export type RawBlock = ProjectBlock | SectionBlock;

export interface RawDocument {
	header:				string;
	formatVersion:		Version;
	productDescription:	string;
	properties:			Entry[];
	projects:			ProjectBlock[];
	globalSections:		SectionBlock[];
	hasGlobal:			boolean;
	comments:			string[];
	eol:				string;
}

//-----------------------------------------------------------------------------
//	line classification
//-----------------------------------------------------------------------------

type Token = 'Project' | 'EndProject' | 'ProjectSection' | 'EndProjectSection' | 'Global' | 'EndGlobal' | 'GlobalSection' | 'EndGlobalSection';

function classify(str: string): Token | undefined {
	switch (str) {
		case 'EndProject':
		case 'EndProjectSection':
		case 'Global':
		case 'EndGlobal':
		case 'EndGlobalSection':
			return str;
	}
	if (str.startsWith('ProjectSection('))
		return 'ProjectSection';
	if (str.startsWith('GlobalSection('))
		return 'GlobalSection';
	if (str.startsWith('Project('))
		return 'Project';
}

type State = 'top' | 'project' | 'projectSection' | 'global' | 'globalSection' | 'end';

const transitions: Record<State, Partial<Record<Token, State>>> = {
	top:			{Project: 'project', Global: 'global'},
	project:		{ProjectSection: 'projectSection', EndProject: 'top', Project: 'project'},
	projectSection:	{EndProjectSection: 'project'},
	global:			{GlobalSection: 'globalSection', EndGlobal: 'end'},
	globalSection:	{EndGlobalSection: 'global'},
	end:			{},
};

const state_names: Record<State, string> = {
	top:			'at solution level',
	project:		'inside a Project block',
	projectSection:	'inside a ProjectSection',
	global:			'inside the Global block',
	globalSection:	'inside a GlobalSection',
	end:			'after EndGlobal',
};

export const assign_re	= /^\s*(.*?)\s*=\s*(.*)$/;
const section_re		= /^(ProjectSection|GlobalSection)\(([^)]*)\)\s*(?:=\s*(.*))?$/;

export function projectLineRe(quote: string) {
	const q		= escapeRe(quote);
	const field	= `${q}((?:[^${q}]|${q}${q})*)${q}`;
	return new RegExp(`^Project\\(\\s*${field}\\s*\\)\\s*=\\s*${field}\\s*,\\s*${field}\\s*,\\s*${field}\\s*$`);
}

export function parseEntry(str: string, line: number): Entry {
	const m = assign_re.exec(str);
	return m ? {key: m[1], value: m[2].trim(), line} : {key: str, line};
}

//-----------------------------------------------------------------------------
//	block parser
//-----------------------------------------------------------------------------

export function parseBlocks(text: string, options: ResolvedOptions, diagnostics: Diagnostics): RawDocument {
	const scanner	= LineScanner.fromText(text);
	const fail		= (reason: string, line = scanner.lineNumber, token = '') => new SolutionParseError(reason, line, token, options.path);
	const project_re = projectLineRe(options.quote);

	const {header, formatVersion, comments} = parseHeader(scanner, fail);
	const doc: RawDocument = {
		header,
		formatVersion,
		productDescription:	'',
		properties:			[],
		projects:			[],
		globalSections:		[],
		hasGlobal:			false,
		comments,
		eol:				scanner.eol,
	};

	const unescape = (s: string) => s.split(options.quote + options.quote).join(options.quote).trim();

	const openProject = (str: string): ProjectBlock => {
		const m = project_re.exec(str);
		if (!m)
			throw fail('Project line is malformed', scanner.lineNumber, str);
		return {
			kind:		'Project',
			header:		{type: unescape(m[1]), name: unescape(m[2]), path: unescape(m[3]), guid: unescape(m[4])},
			sections:	[],
			line:		scanner.lineNumber,
		};
	};

	const openSection = (str: string): SectionBlock => {
		const m = section_re.exec(str);
		if (!m || !m[2].trim())
			throw fail('Section id missing', scanner.lineNumber, str);
		const order = (m[3] ?? '').trim();
		if (!isSectionOrder(order))
			throw fail('Invalid section type', scanner.lineNumber, order);
		return {kind: m[1] === 'ProjectSection' ? 'ProjectSection' : 'GlobalSection', name: m[2].trim(), order, entries: [], line: scanner.lineNumber};
	};

	let state:		State = 'top';
	let project:	ProjectBlock | undefined;
	let section:	SectionBlock | undefined;
	let global_line	= 0;
	let first_line	= 0;
	let str:		string | null;

	while ((str = scanner.nextLine()) !== null) {
		if (!first_line)
			first_line = scanner.lineNumber;
		const line	= scanner.lineNumber;
		const token	= classify(str);

		if (!token) {
			if (section)
				section.entries.push(parseEntry(str, line));
			else if ((state === 'top' || state === 'end') && assign_re.test(str))
				doc.properties.push(parseEntry(str, line));
			// anything else out of place is ignored
			continue;
		}

		const next: State | undefined = transitions[state][token];
		if (!next) {
			if (token === 'Global' && doc.hasGlobal)
				throw fail('Global section specified more than once', line, str);
			throw fail(`'${token}' is not valid ${state_names[state]}`, line, str);
		}

		switch (token) {
			case 'Project':
				if (project) {
					diagnostics.warn(line, `Project '${project.header.name}' has no EndProject`);
					doc.projects.push(project);
				}
				project = openProject(str);
				break;

			case 'EndProject':
				if (project)
					doc.projects.push(project);
				project = undefined;
				break;

			case 'ProjectSection':
			case 'GlobalSection':
				section = openSection(str);
				break;

			case 'EndProjectSection':
				if (section)
					project?.sections.push(section);
				section = undefined;
				break;

			case 'EndGlobalSection':
				if (section)
					doc.globalSections.push(section);
				section = undefined;
				break;

			case 'Global':
				doc.hasGlobal	= true;
				global_line		= line;
				break;

			case 'EndGlobal':
				break;
		}
		state = next;
	}

	switch (state) {
		case 'project':
		case 'projectSection':
			if (section)
				throw fail(`Unterminated ProjectSection(${section.name})`, section.line);
			throw fail(`Unterminated Project '${project?.header.name ?? ''}'`, project?.line ?? 0);
		case 'global':
			throw fail('Unterminated Global block', global_line);
		case 'globalSection':
			throw fail(`Unterminated GlobalSection(${section?.name ?? ''})`, section?.line ?? global_line);
	}

	// only a comment ahead of every other line after the header names the product
	const product = scanner.comments[0];
	if (product && (!first_line || product.line < first_line))
		doc.productDescription = product.text;
	return doc;
}

function parseHeader(scanner: LineScanner, fail: (reason: string, line?: number, token?: string) => SolutionParseError) {
	const comments: string[] = [];
	for (let i = 0; i < 2; i++) {
		const str = scanner.readLine();
		if (str === null)
			break;

		if (str.startsWith(HEADER_PREFIX)) {
			const text		= str.slice(HEADER_PREFIX.length).trim();
			const version	= Version.parse(text);
			if (!version || version.major < MIN_FORMAT_VERSION)
				throw fail(`Solution file format version must be between ${MIN_FORMAT_VERSION} and ${MAX_FORMAT_VERSION}`, scanner.lineNumber, text);
			if (version.major > MAX_FORMAT_VERSION)
				comments.push(`Solution file format version ${version.major} is newer than ${MAX_FORMAT_VERSION}; loading it anyway`);
			return {header: str, formatVersion: version, comments};
		}
	}
	throw fail('No file format header found', 0);
}
