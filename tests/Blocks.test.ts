import { describe, it, expect } from 'vitest';
import { parseBlocks, HEADER_PREFIX } from '../src/Blocks';
import { resolveOptions, Diagnostics, type ParseOptions } from '../src/Options';
import { SolutionParseError } from '../src/Errors';

const HEADER	= `${HEADER_PREFIX}12.00`;
const CS		= '{FAE04EC0-301F-11D3-BF4B-00C04F79EFBC}';

function parse(lines: string[], options: ParseOptions = {}) {
	const resolved		= resolveOptions({log: () => {}, ...options});
	const diagnostics	= new Diagnostics(resolved);
	return {doc: parseBlocks(lines.join('\n'), resolved, diagnostics), diagnostics};
}

function parseError(lines: string[]): SolutionParseError {
	try {
		parse(lines);
	} catch (error) {
		if (error instanceof SolutionParseError)
			return error;
		throw error;
	}
	throw new Error('no error raised');
}

describe('parseBlocks', () => {
	it('reads project blocks, their sections and global sections', () => {
		const {doc} = parse([
			HEADER,
			`Project("${CS}") = "A", "a\\A.csproj", "{A}"`,
			'\tProjectSection(ProjectDependencies) = postProject',
			'\t\t{B} = {B}',
			'\tEndProjectSection',
			'EndProject',
			'Global',
			'\tGlobalSection(SolutionProperties) = preSolution',
			'\t\tHideSolutionNode = FALSE',
			'\tEndGlobalSection',
			'EndGlobal',
		]);

		expect(doc.formatVersion.toString()).toBe('12.0');
		expect(doc.eol).toBe('\n');
		expect(doc.hasGlobal).toBe(true);
		expect(doc.projects).toHaveLength(1);
		expect(doc.projects[0].header).toEqual({type: CS, name: 'A', path: 'a\\A.csproj', guid: '{A}'});
		expect(doc.projects[0].line).toBe(2);
		expect(doc.projects[0].sections).toEqual([{
			kind:		'ProjectSection',
			name:		'ProjectDependencies',
			order:		'postProject',
			entries:	[{key: '{B}', value: '{B}', line: 4}],
			line:		3,
		}]);
		expect(doc.globalSections).toEqual([{
			kind:		'GlobalSection',
			name:		'SolutionProperties',
			order:		'preSolution',
			entries:	[{key: 'HideSolutionNode', value: 'FALSE', line: 9}],
			line:		8,
		}]);
	});

	it('keeps sections it does not know, and drops comments inside them', () => {
		const {doc} = parse([
			HEADER,
			`Project("${CS}") = "A", "A.csproj", "{A}"`,
			'\tProjectSection(FutureThing) = preProject',
			'\t\t# ignored',
			'\t\tSome.Key = value',
			'\t\tBareLine',
			'\tEndProjectSection',
			'EndProject',
		]);

		expect(doc.projects[0].sections[0].name).toBe('FutureThing');
		expect(doc.projects[0].sections[0].entries).toEqual([
			{key: 'Some.Key', value: 'value', line: 5},
			{key: 'BareLine', line: 6},
		]);
		expect(doc.hasGlobal).toBe(false);
	});

	it('collects top level properties and the product line', () => {
		const {doc} = parse([
			'',
			HEADER,
			'# Visual Studio Version 17',
			'VisualStudioVersion = 17.5.33424.131',
		]);

		expect(doc.productDescription).toBe('Visual Studio Version 17');
		expect(doc.properties).toEqual([{key: 'VisualStudioVersion', value: '17.5.33424.131', line: 4}]);
	});

	it('takes no product line from comments further down', () => {
		const {doc} = parse([
			HEADER,
			`Project("${CS}") = "A", "A.csproj", "{A}"`,
			'\tProjectSection(Custom) = preProject',
			'\t\t# generated by a tool, do not edit',
			'\tEndProjectSection',
			'EndProject',
			'# trailing note',
		]);

		expect(doc.productDescription).toBe('');
	});

	it('honours a different quote character', () => {
		const {doc} = parse([HEADER, `Project('${CS}') = 'It''s', 'a.csproj', '{A}'`, 'EndProject'], {quote: "'"});

		expect(doc.projects[0].header.name).toBe("It's");
	});

	it('warns when a project is not closed before the next one', () => {
		const {doc, diagnostics} = parse([
			HEADER,
			`Project("${CS}") = "A", "A.csproj", "{A}"`,
			`Project("${CS}") = "B", "B.csproj", "{B}"`,
			'EndProject',
		]);

		expect(doc.projects.map(i => i.header.name)).toEqual(['A', 'B']);
		expect(diagnostics.warnings).toEqual([{line: 3, message: "Project 'A' has no EndProject"}]);
	});

	it('records a comment for format versions newer than it knows', () => {
		const {doc} = parse([`${HEADER_PREFIX}13.00`]);

		expect(doc.comments).toEqual(['Solution file format version 13 is newer than 12; loading it anyway']);
	});

	describe('fatal errors', () => {
		it('needs the header on one of the first two lines', () => {
			const error = parseError(['', '', HEADER]);

			expect(error.reason).toBe('No file format header found');
			expect(error.line).toBe(0);
		});

		it('rejects format versions before 7', () => {
			const error = parseError([`${HEADER_PREFIX}6.00`]);

			expect(error.reason).toBe('Solution file format version must be between 7 and 12');
			expect(error.line).toBe(1);
			expect(error.token).toBe('6.00');
		});

		it('rejects a global section inside a project', () => {
			const error = parseError([
				HEADER,
				`Project("${CS}") = "A", "A.csproj", "{A}"`,
				'\tGlobalSection(X) = preSolution',
			]);

			expect(error.reason).toBe("'GlobalSection' is not valid inside a Project block");
			expect(error.line).toBe(3);
			expect(error.token).toBe('GlobalSection(X) = preSolution');
			expect(error.message).toBe("<solution>(3): 'GlobalSection' is not valid inside a Project block [GlobalSection(X) = preSolution]");
		});

		it('rejects a second Global block', () => {
			const error = parseError([HEADER, 'Global', 'EndGlobal', 'Global']);

			expect(error.reason).toBe('Global section specified more than once');
			expect(error.line).toBe(4);
		});

		it('reports an unterminated block at the line that opened it', () => {
			const section = parseError([
				HEADER,
				`Project("${CS}") = "A", "A.csproj", "{A}"`,
				'\tProjectSection(ProjectDependencies) = postProject',
				'\t\t{B} = {B}',
			]);
			expect(section.reason).toBe('Unterminated ProjectSection(ProjectDependencies)');
			expect(section.line).toBe(3);

			const project = parseError([HEADER, '', `Project("${CS}") = "A", "A.csproj", "{A}"`]);
			expect(project.reason).toBe("Unterminated Project 'A'");
			expect(project.line).toBe(3);

			const global = parseError([HEADER, 'Global', '\tGlobalSection(X) = preSolution']);
			expect(global.reason).toBe('Unterminated GlobalSection(X)');
			expect(global.line).toBe(3);
		});

		it('rejects an unknown section order', () => {
			const error = parseError([
				HEADER,
				`Project("${CS}") = "A", "A.csproj", "{A}"`,
				'\tProjectSection(X) = sometimes',
			]);

			expect(error.reason).toBe('Invalid section type');
			expect(error.token).toBe('sometimes');
		});

		it('rejects a project line with missing fields', () => {
			const error = parseError([HEADER, `Project("${CS}") = "A", "A.csproj"`]);

			expect(error.reason).toBe('Project line is malformed');
			expect(error.line).toBe(2);
		});
	});
});
