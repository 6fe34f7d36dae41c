import * as path from 'path';
import type { SectionBlock } from './Blocks';
import type { ProjectConfiguration } from './Configurations';
import type { ProjectReference } from './References';
import type { WebCompilerParameters } from './WebProperties';
import { normalizeEntryPath } from './Paths';

//-----------------------------------------------------------------------------
//	project types
//-----------------------------------------------------------------------------

export type ProjectKind = 'project' | 'folder' | 'web' | 'webDeployment' | 'shared' | 'unknown';

export const FOLDER_TYPE	= '{2150E333-8FDC-42A3-9474-1A3956D46DE8}';
export const WEB_TYPE		= '{E24C65DC-7377-472B-9ABA-BC803B73C61A}';
export const VC_TYPE		= '{8BC9CEB8-8B4A-11D0-8D11-00A0C91BC942}';
export const CS_TYPE		= '{FAE04EC0-301F-11D3-BF4B-00C04F79EFBC}';

interface KnownProjectType {
	kind:	ProjectKind,
	ext?:	string,
}

const known_types = new Map<string, KnownProjectType>();
let known_exts: Map<string, string> | undefined;

export function addKnownTypes(known: Record<string, KnownProjectType>) {
	for (const [guid, entry] of Object.entries(known))
		known_types.set(guid.toUpperCase(), entry);
	known_exts = undefined;
}

/** Kind of project for a type token; anything not in the known set is 'unknown' */
export function kindFromType(type: string, relativePath = ''): ProjectKind {
	const kind = known_types.get(type.toUpperCase())?.kind ?? 'unknown';
	// pre-MSBuild C++ projects share the C++ token
	if (type.toUpperCase() === VC_TYPE && path.extname(relativePath).toLowerCase() === '.vcproj')
		return 'unknown';
	return kind;
}

export function typeFromExt(ext: string): string | undefined {
	if (!known_exts)
		known_exts = new Map([...known_types].filter(([_, v]) => v.ext).map(([k, v]): [string, string] => [v.ext ?? '', k]));
	return known_exts.get((ext[0] === '.' ? ext.slice(1) : ext).toLowerCase());
}

addKnownTypes({
	/*VB.NET*/					"{F184B08F-C81C-45F6-A57F-5ABD9991F28F}": {kind: 'project', ext: 'vbproj'},
	/*C#*/						[CS_TYPE]:								{kind: 'project', ext: 'csproj'},
	/*CPS*/						"{13B669BE-BB05-4DDF-9536-439F39A36129}": {kind: 'project'},
	/*C# (CPS)*/				"{9A19103F-16F7-4668-BE54-9A1E7A4F7556}": {kind: 'project'},
	/*VB.NET (CPS)*/			"{778DAE3C-4631-46EA-AA77-85C1314464D9}": {kind: 'project'},
	/*F# (CPS)*/				"{6EC3EE1D-3C4E-46DD-8F32-0CC8E7565705}": {kind: 'project'},
	/*F#*/						"{F2A71F9B-5D33-465A-A702-920D77279786}": {kind: 'project', ext: 'fsproj'},
	/*J#*/						"{E6FDF86B-F3D1-11D4-8576-0002A516ECE8}": {kind: 'project', ext: 'vjsproj'},
	/*C++*/						[VC_TYPE]:								{kind: 'project', ext: 'vcxproj'},
	/*Database*/				"{C8D11400-126E-41CD-887F-60BD40844F9E}": {kind: 'project', ext: 'dbproj'},
	/*Synergex*/				"{BBD0F5D1-1CC4-42FD-BA4C-A96779C64378}": {kind: 'project', ext: 'synproj'},
	/*Shared Project*/			"{D954291E-2A0B-460D-934E-DC6B0785DB48}": {kind: 'shared', ext: 'shproj'},
	/*Web Site*/				[WEB_TYPE]:								{kind: 'web'},
	/*Web Deployment*/			"{2CFEAB61-6A3B-4EB8-B523-560B4BEEF521}": {kind: 'webDeployment', ext: 'wdproj'},
	/*Solution Folder*/			[FOLDER_TYPE]:							{kind: 'folder'},
});

//-----------------------------------------------------------------------------
//	ProjectEntry
//-----------------------------------------------------------------------------

/** One project or solution folder, as declared */
export class ProjectEntry {
	readonly kind:		ProjectKind;
	/** path exactly as written, for writing back */
	readonly declaredPath:	string;
	/** path with host separators when normalization was asked for, else as written */
	readonly relativePath:	string;

	parent?:				string;
	dependencies:			string[] = [];
	references:				ProjectReference[] = [];
	webParameters			= new Map<string, WebCompilerParameters>();
	targetFrameworkMoniker?: string;
	solutionItems:			string[] = [];
	configuration:			Record<string, ProjectConfiguration> = {};
	/** every section of the project block in order, including ones nothing here interprets */
	sections:				SectionBlock[] = [];

	uniqueName				= '';
	originalName			= '';
	displayPath				= '';

	constructor(public type: string, public name: string, declaredPath: string, public guid: string, normalizePaths = false, public line = 0) {
		this.declaredPath	= declaredPath;
		this.relativePath	= normalizeEntryPath(declaredPath, normalizePaths);
		this.kind			= kindFromType(type, declaredPath);
	}

	get isFolder()		{ return this.kind === 'folder'; }
	get isWeb()			{ return this.kind === 'web'; }

	/** website reference identifiers, separate from build dependencies */
	get projectReferences() {
		return this.references.map(i => i.guid);
	}

	addDependency(guid: string): void {
		this.dependencies.push(guid);
	}

	setProjectConfiguration(name: string, config: ProjectConfiguration) {
		this.configuration[name] = config;
	}
	configurationList() : string[] {
		return [...new Set(Object.values(this.configuration).map(i => i.Configuration))];
	}
}
