/**
 * arbor-dom — XML name character classification
 *
 * Code-point ranges follow XML 1.0 (fifth edition) §2.3, productions [4]
 * and [4a]. The colon is kept out of both tables: qualified names are split
 * on `:` and each half is checked as an NCName (XML Namespaces 1.0 §3).
 */

type CodeRange = readonly [number, number];

/** NameStartChar minus `:`. Sorted, non-overlapping. */
const NAME_START_RANGES: readonly CodeRange[] = [
	[0x41, 0x5a], // A-Z
	[0x5f, 0x5f], // _
	[0x61, 0x7a], // a-z
	[0xc0, 0xd6],
	[0xd8, 0xf6],
	[0xf8, 0x2ff],
	[0x370, 0x37d],
	[0x37f, 0x1fff],
	[0x200c, 0x200d],
	[0x2070, 0x218f],
	[0x2c00, 0x2fef],
	[0x3001, 0xd7ff],
	[0xf900, 0xfdcf],
	[0xfdf0, 0xfffd],
	[0x10000, 0xeffff],
];

/** The extra characters NameChar allows on top of NameStartChar. */
const NAME_EXTRA_RANGES: readonly CodeRange[] = [
	[0x2d, 0x2e], // - .
	[0x30, 0x39], // 0-9
	[0xb7, 0xb7],
	[0x300, 0x36f],
	[0x203f, 0x2040],
];

const COLON = 0x3a;

function inRanges(code: number, ranges: readonly CodeRange[]): boolean {
	let low = 0;
	let high = ranges.length - 1;
	while (low <= high) {
		const mid = (low + high) >> 1;
		const [start, end] = ranges[mid];
		if (code < start) high = mid - 1;
		else if (code > end) low = mid + 1;
		else return true;
	}
	return false;
}

export function isNCNameStartCode(code: number): boolean {
	return inRanges(code, NAME_START_RANGES);
}

export function isNCNameCode(code: number): boolean {
	return inRanges(code, NAME_START_RANGES) || inRanges(code, NAME_EXTRA_RANGES);
}

/**
 * Walks `s` by code point, so astral characters count once.
 * `allowColon` switches between the Name and NCName productions.
 */
function isNameLike(s: string, allowColon: boolean): boolean {
	if (s.length === 0) return false;
	let first = true;
	for (const ch of s) {
		const code = ch.codePointAt(0) ?? -1;
		const ok = (allowColon && code === COLON) || (first ? isNCNameStartCode(code) : isNCNameCode(code));
		if (!ok) return false;
		first = false;
	}
	return true;
}

/** XML 1.0 production [5] `Name`. */
export function isXmlName(s: string): boolean {
	return isNameLike(s, true);
}

/** XML Namespaces production [4] `NCName` (a Name without colons). */
export function isNCName(s: string): boolean {
	return isNameLike(s, false);
}
