//-----------------------------------------------------------------------------
//	line scanning
//-----------------------------------------------------------------------------

export const COMMENT_CHAR = '#';

export interface Comment {
	line:	number;
	text:	string;
}

/** Walks solution text one trimmed line at a time, counting lines from 1 */
export class LineScanner {
	private _currentLineIndex = -1;
	readonly comments: Comment[] = [];
	readonly eol: string;

	constructor(private lines: string[], eol = '\n') {
		this.eol = eol;
	}

	static fromText(text: string) {
		if (text.charCodeAt(0) === 0xfeff)
			text = text.slice(1);
		return new LineScanner(text.split(/\r?\n/), text.includes('\r\n') ? '\r\n' : '\n');
	}

	get lineNumber() {
		return this._currentLineIndex + 1;
	}

	currentLine(): string {
		return this.lines[this._currentLineIndex]?.trim() ?? '';
	}

	/** Next line, whatever it holds */
	readLine(): string | null {
		if (this._currentLineIndex + 1 >= this.lines.length)
			return null;
		return this.lines[++this._currentLineIndex].trim();
	}

	/** Next line that is neither blank nor a full-line comment */
	nextLine(): string | null {
		let str: string | null;
		while ((str = this.readLine()) !== null) {
			if (str[0] === COMMENT_CHAR)
				this.comments.push({line: this.lineNumber, text: str.slice(1).trim()});
			else if (str)
				return str;
		}
		return null;
	}
}
