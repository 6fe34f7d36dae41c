import * as path from 'path';
import { SolutionParseError, SerializerError } from './Errors';
import type { ParseOptions } from './Options';
import { HEADER_PREFIX } from './Blocks';
import { Solution, parseSolution, setFilter } from './Solution';
import { XmlSolutionSerializer } from './Slnx';
import { text_load, text_save } from './Files';
import { toOSPath } from './Paths';

//-----------------------------------------------------------------------------
//	serializers
//-----------------------------------------------------------------------------

export type SolutionFormat = 'legacy' | 'structured';

export interface SaveOptions {
	/** handed to the file system calls as is */
	signal?:		AbortSignal;
}

export interface LoadOptions extends ParseOptions, SaveOptions {
	format?:		SolutionFormat | 'auto';
	serializers?:	SolutionSerializer[];
}

/** Gets a model from a path, or puts one there */
export interface SolutionSerializer {
	readonly format:		SolutionFormat;
	/** lower case, with the dot */
	readonly extensions:	string[];
	sniff(content: string): boolean;
	open(file: string, options?: LoadOptions): Promise<Solution>;
	save(file: string, solution: Solution, options?: SaveOptions): Promise<void>;
}

export class LegacySolutionSerializer implements SolutionSerializer {
	readonly format		= 'legacy';
	readonly extensions	= ['.sln'];

	sniff(content: string) {
		return content.split(/\r?\n/, 2).some(i => i.replace(/^\uFEFF/, '').trim().startsWith(HEADER_PREFIX));
	}

	async open(file: string, options: LoadOptions = {}) {
		const text = await text_load(file, options.signal);
		return parseSolution(text, {...options, path: file});
	}

	async save(file: string, solution: Solution, options: SaveOptions = {}) {
		return text_save(file, solution.format(), options.signal);
	}
}

export const defaultSerializers: readonly SolutionSerializer[] = [new LegacySolutionSerializer, new XmlSolutionSerializer];

//-----------------------------------------------------------------------------
//	dispatch
//-----------------------------------------------------------------------------

export const FILTER_EXT = '.slnf';

/** Picks by the format toggle or the extension, and reads the file to sniff it only when `sniff` is set */
async function pick(file: string, options: LoadOptions, sniff = true): Promise<SolutionSerializer> {
	const serializers	= options.serializers ?? defaultSerializers;
	const format		= options.format ?? 'auto';

	if (format !== 'auto') {
		const s = serializers.find(i => i.format === format);
		if (!s)
			throw new SerializerError(`No ${format} serializer`, file);
		return s;
	}

	const ext	= path.extname(file).toLowerCase();
	const byext	= serializers.find(i => i.extensions.includes(ext));
	if (byext)
		return byext;
	if (!sniff)
		throw new SerializerError('Unrecognized solution format', file);

	const content	= await text_load(file, options.signal);
	const bysig		= serializers.find(i => i.sniff(content));
	if (!bysig)
		throw new SerializerError('Unrecognized solution format', file);
	return bysig;
}

function other(source: SolutionSerializer, options: LoadOptions, file: string) {
	const target = (options.serializers ?? defaultSerializers).find(i => i.format !== source.format);
	if (!target)
		throw new SerializerError(`No serializer to convert ${source.format} to`, file);
	return target;
}

/** Loads a solution, a structured solution, or a solution filter */
export async function load(file: string, options: LoadOptions = {}): Promise<Solution> {
	if (path.extname(file).toLowerCase() === FILTER_EXT)
		return loadFilter(file, options);
	return (await pick(file, options)).open(file, options);
}

/** Saves in whichever format the extension names */
export async function save(file: string, solution: Solution, options: LoadOptions = {}): Promise<void> {
	return (await pick(file, options, false)).save(file, solution, options);
}

/** Loads in one format, saves beside it in the other, and returns where */
export async function convert(file: string, options: LoadOptions = {}): Promise<string> {
	const source	= await pick(file, options);
	const target	= other(source, options, file);
	const solution	= await source.open(file, options);
	const parsed	= path.parse(file);
	const newpath	= path.join(parsed.dir, parsed.name + target.extensions[0]);
	await target.save(newpath, solution, options);
	return newpath;
}

//-----------------------------------------------------------------------------
//	solution filters
//-----------------------------------------------------------------------------

export interface SolutionFilter {
	solution: {
		path:		string;
		projects:	string[];
	};
}

function isRecord(x: unknown): x is Record<string, unknown> {
	return typeof x === 'object' && x !== null && !Array.isArray(x);
}

export function isSolutionFilter(x: unknown): x is SolutionFilter {
	return isRecord(x)
		&& isRecord(x.solution)
		&& typeof x.solution.path === 'string'
		&& Array.isArray(x.solution.projects)
		&& x.solution.projects.every(i => typeof i === 'string');
}

export function parseFilter(text: string, file: string): SolutionFilter {
	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch (error) {
		throw new SerializerError(`Invalid solution filter: ${error}`, file, error);
	}
	if (!isSolutionFilter(json))
		throw new SerializerError('Solution filter has no solution path and project list', file);
	return json;
}

async function loadFilter(file: string, options: LoadOptions) {
	const filter	= parseFilter(await text_load(file, options.signal), file);
	const solution	= await load(path.resolve(path.dirname(file), toOSPath(filter.solution.path)), options);
	setFilter(solution, filter.solution.projects, (reason, line, token) => new SolutionParseError(reason, line, token, file));
	return solution;
}
