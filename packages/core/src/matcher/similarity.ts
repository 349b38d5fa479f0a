// ============================================================================
// Header Normalization & String Similarity
// ============================================================================

import abbreviationTable from "./abbreviations.json";

const ABBREVIATIONS: Readonly<Record<string, string>> = abbreviationTable;

/**
 * Normalize a header for comparison.
 * - Unicode compatibility form (full-width characters, ligatures)
 * - Lowercase
 * - Underscores, dashes, slashes and dots become word breaks
 * - Remaining punctuation and symbols are stripped
 * - Whitespace collapsed and trimmed
 *
 * `"Cust. Name"`, `"cust_name"` and `" CUST  NAME "` all normalize to `"cust name"`.
 */
export function normalizeHeader(text: string): string {
	return text
		.normalize("NFKC")
		.toLowerCase()
		.replace(/[_\-/\\.]+/g, " ")
		.replace(/[^\p{L}\p{N}\s]/gu, "")
		.replace(/\s+/g, " ")
		.trim();
}

/**
 * Split a header into normalized words.
 */
export function tokenize(text: string): string[] {
	return normalizeHeader(text)
		.split(" ")
		.filter((t) => t.length > 0);
}

/**
 * Expand known abbreviations word by word (`"cust nm"` → `"customer name"`).
 * Returns the normalized header unchanged when no word is abbreviated.
 */
export function expandAbbreviations(text: string): string {
	return tokenize(text)
		.map((token) => ABBREVIATIONS[token] ?? token)
		.join(" ");
}

/**
 * Levenshtein edit distance (two-row Wagner-Fischer).
 */
export function levenshtein(a: string, b: string): number {
	if (a === b) return 0;
	if (a.length === 0) return b.length;
	if (b.length === 0) return a.length;

	// Keep the rows as short as the shorter string
	const shorter = a.length <= b.length ? a : b;
	const longer = a.length <= b.length ? b : a;

	let prevRow = new Array<number>(shorter.length + 1);
	let currRow = new Array<number>(shorter.length + 1);

	for (let i = 0; i <= shorter.length; i++) {
		prevRow[i] = i;
	}

	for (let j = 1; j <= longer.length; j++) {
		currRow[0] = j;
		for (let i = 1; i <= shorter.length; i++) {
			const cost = shorter[i - 1] === longer[j - 1] ? 0 : 1;
			currRow[i] = Math.min(prevRow[i] + 1, currRow[i - 1] + 1, prevRow[i - 1] + cost);
		}
		const temp = prevRow;
		prevRow = currRow;
		currRow = temp;
	}

	return prevRow[shorter.length];
}

/**
 * Edit distance scaled to 0-1 (1 = identical).
 */
export function levenshteinSimilarity(a: string, b: string): number {
	if (a === b) return 1;
	const maxLen = Math.max(a.length, b.length);
	if (maxLen === 0) return 1;
	return 1 - levenshtein(a, b) / maxLen;
}

/**
 * Word-level similarity: every word is paired with its closest word on the other side,
 * in both directions, and the two averages are averaged.
 */
export function tokenSimilarity(a: string, b: string): number {
	const tokensA = tokenize(a);
	const tokensB = tokenize(b);

	if (tokensA.length === 0 || tokensB.length === 0) {
		return 0;
	}

	const bestAverage = (from: string[], to: string[]): number => {
		let total = 0;
		for (const token of from) {
			let best = 0;
			for (const other of to) {
				best = Math.max(best, levenshteinSimilarity(token, other));
			}
			total += best;
		}
		return total / from.length;
	};

	return (bestAverage(tokensA, tokensB) + bestAverage(tokensB, tokensA)) / 2;
}

/**
 * True when one normalized string contains the other (both at least 3 characters).
 */
export function containsMatch(a: string, b: string): boolean {
	const normA = normalizeHeader(a);
	const normB = normalizeHeader(b);

	if (normA.length < 3 || normB.length < 3) {
		return false;
	}

	return normA.includes(normB) || normB.includes(normA);
}

export function commonPrefixLength(a: string, b: string): number {
	const minLen = Math.min(a.length, b.length);
	let i = 0;
	while (i < minLen && a[i] === b[i]) {
		i++;
	}
	return i;
}

/**
 * Composite similarity between two headers, in [0, 1] and symmetric.
 * Takes the best of edit distance, containment (0.7-0.9), word overlap
 * and shared prefix (0.5-0.9).
 */
export function headerSimilarity(a: string, b: string): number {
	const h = normalizeHeader(a);
	const t = normalizeHeader(b);

	if (h === t) {
		return 1;
	}
	if (h.length === 0 || t.length === 0) {
		return 0;
	}

	let score = levenshteinSimilarity(h, t);

	if (containsMatch(h, t)) {
		const ratio = Math.min(h.length, t.length) / Math.max(h.length, t.length);
		score = Math.max(score, 0.7 + 0.2 * ratio);
	}

	score = Math.max(score, tokenSimilarity(h, t));

	const prefixLen = commonPrefixLength(h, t);
	if (prefixLen >= 3) {
		const prefixRatio = prefixLen / Math.max(h.length, t.length);
		score = Math.max(score, 0.5 + 0.4 * prefixRatio);
	}

	return score;
}

/**
 * Best similarity of a header (as written and with abbreviations expanded)
 * against a field name and its aliases.
 */
export function bestFieldSimilarity(
	header: string,
	fieldName: string,
	aliases?: readonly string[]
): { score: number; matchedVia: string } {
	const variants = [normalizeHeader(header)];
	const expanded = expandAbbreviations(header);
	if (expanded !== variants[0]) {
		variants.push(expanded);
	}

	let best = { score: 0, matchedVia: fieldName };
	for (const target of [fieldName, ...(aliases ?? [])]) {
		for (const variant of variants) {
			const score = headerSimilarity(variant, target);
			if (score > best.score) {
				best = { score, matchedVia: target };
			}
		}
	}
	return best;
}
