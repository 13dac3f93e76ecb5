/**
 * arbor-dom — Which node kinds may be children of which
 *
 * DOM Level 2 Core §1.1.1. Slot limits (one document element, one doctype
 * per document) are enforced by the document itself, not by this table.
 */

import type { NodeType } from './types.ts';

const CONTENT = new Set<NodeType>(['element', 'text', 'comment', 'processing-instruction', 'cdata', 'entity-reference']);
const NONE = new Set<NodeType>();

const ALLOWED_CHILDREN: Readonly<Record<NodeType, ReadonlySet<NodeType>>> = {
	document: new Set<NodeType>(['element', 'comment', 'processing-instruction', 'doctype']),
	'document-fragment': CONTENT,
	element: CONTENT,
	'entity-reference': CONTENT,
	entity: CONTENT,
	attribute: new Set<NodeType>(['text', 'entity-reference']),
	text: NONE,
	cdata: NONE,
	'processing-instruction': NONE,
	comment: NONE,
	doctype: NONE,
	notation: NONE,
};

export function isChildAllowed(parent: NodeType, child: NodeType): boolean {
	return ALLOWED_CHILDREN[parent].has(child);
}

/** Kinds whose `nodeValue` is meaningful and writable. */
const VALUED = new Set<NodeType>(['attribute', 'text', 'cdata', 'comment', 'processing-instruction']);

export function hasNodeValue(type: NodeType): boolean {
	return VALUED.has(type);
}
