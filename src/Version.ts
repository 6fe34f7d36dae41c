export class Version {
	parts: number[];
	constructor(...parts: number[]) { this.parts = parts; }
	get major()		{ return this.parts[0] ?? 0; }
	get minor()		{ return this.parts[1] ?? 0; }
	get build()		{ return this.parts[2] ?? 0; }
	get revision() 	{ return this.parts[3] ?? 0; }

	toString() {
		return this.parts.join('.');
	}
	compare(b: Version) {
		const n = Math.max(this.parts.length, b.parts.length);
		for (let i = 0; i < n; i++) {
			const x = this.parts[i] ?? 0;
			const y = b.parts[i] ?? 0;
			if (x !== y)
				return x - y;
		}
		return 0;
	}

	// accepts "12.00" as well as "15.0.27130.2010 VSPRO_PLATFORM"
	static parse(v?: string) {
		const text = v?.trim().split(/\s+/)[0];
		if (text) {
			const parts = text.split('.').map(i => i === '' ? NaN : +i);
			if (parts.length >= 2 && parts.length <= 4 && parts.every(i => Number.isInteger(i) && i >= 0))
				return new Version(...parts);
		}
	}
}
