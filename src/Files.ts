import * as fs from 'fs';
import * as xml from '@isopodlabs/xml';
import { SerializerError } from './Errors';

//-----------------------------------------------------------------------------
//	fs helpers
//-----------------------------------------------------------------------------

export function exists(file: string): Promise<boolean> {
	return fs.promises.access(file).then(() => true).catch(() => false);
}

export async function text_load(filename: string, signal?: AbortSignal): Promise<string> {
	return fs.promises.readFile(filename, {encoding: 'utf-8', signal}).catch(error => {
		throw new SerializerError(`Failed to read: ${error}`, filename, error);
	});
}

export async function text_save(filename: string, content: string, signal?: AbortSignal): Promise<void> {
	return fs.promises.writeFile(filename, content, {signal}).catch(error => {
		throw new SerializerError(`Failed to save: ${error}`, filename, error);
	});
}

//-----------------------------------------------------------------------------
//	xml helpers
//-----------------------------------------------------------------------------

export async function xml_load(filename: string, signal?: AbortSignal): Promise<xml.Element> {
	const content = await text_load(filename, signal);
	try {
		return xml.parse(content);
	} catch (error) {
		throw new SerializerError(`Invalid xml: ${error}`, filename, error);
	}
}

export async function xml_save(filename: string, element: xml.Element, signal?: AbortSignal): Promise<void> {
	return text_save(filename, element.toString(), signal);
}
