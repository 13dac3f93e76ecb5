/**
 * arbor-dom — Subtree search
 *
 * Depth-first, pre-order: the starting element first, then each child
 * element's subtree in child order. Only Element children are descended
 * into; text, comments and the rest are skipped.
 */

import { isElement } from './types.ts';
import type { Element } from './types.ts';
import { namespacedNameMatches, tagNameMatches } from './name.ts';

type ElementTest = (element: Element) => boolean;

function collect(element: Element, test: ElementTest, results: Element[]): void {
	if (test(element)) results.push(element);
	for (const item of element.childNodes) {
		if (isElement(item)) collect(item, test, results);
	}
}

/** `root` and its descendant elements whose qualified name matches `tagName`. */
export function elementsByTagName(root: Element, tagName: string): Element[] {
	const results: Element[] = [];
	collect(root, (el) => tagNameMatches(el.tagName, tagName), results);
	return results;
}

/** Namespace-aware variant of {@link elementsByTagName}; `*` matches any URI or local name. */
export function elementsByTagNameNS(root: Element, namespaceURI: string, localName: string): Element[] {
	const results: Element[] = [];
	collect(root, (el) => namespacedNameMatches(el.name, namespaceURI, localName), results);
	return results;
}
