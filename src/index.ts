export { Version } from './Version';
export { SolutionParseError, SerializerError } from './Errors';
export type { ParseWarning } from './Errors';
export { resolveOptions, Diagnostics } from './Options';
export type { ParseOptions, ResolvedOptions } from './Options';
export { LineScanner } from './Scanner';
export type { Comment } from './Scanner';
export { parseBlocks } from './Blocks';
export type { RawDocument, RawBlock, ProjectBlock, ProjectHeader, SectionBlock, SectionOrder, Entry } from './Blocks';
export { parseDependencies, parseProjectReferences } from './References';
export type { ProjectReference } from './References';
export { parseSolutionConfigurations, mapProjectConfigurations, fullName } from './Configurations';
export type { SolutionConfiguration, ProjectConfiguration } from './Configurations';
export { extractWebProperties } from './WebProperties';
export type { WebCompilerParameters, WebProperties } from './WebProperties';
export { ProjectEntry, kindFromType, typeFromExt, addKnownTypes } from './Project';
export type { ProjectKind } from './Project';
export { Solution, buildSolution, parseSolution, formatSolution } from './Solution';
export { XmlSolutionSerializer } from './Slnx';
export { load, save, convert, LegacySolutionSerializer } from './Bridge';
export type { SolutionSerializer, LoadOptions, SaveOptions, SolutionFormat, SolutionFilter } from './Bridge';
export { toOSPath, toDeclaredPath, toPosixPath, normalizeEntryPath, isUrl } from './Paths';
export { exists } from './Files';
