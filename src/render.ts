/**
 * arbor-dom — Diagnostic rendering
 *
 * Produces markup-shaped text for tests and debugging. It is not a
 * serializer: values are written verbatim (no escaping), elements always
 * get an explicit end tag and a document renders its doctype, then its
 * other children, then its document element.
 */

import { isAttribute, isDocument, isDocumentType, isElement, isProcessingInstruction } from './types.ts';
import type { Attribute, Node } from './types.ts';

function renderAll(nodes: Iterable<Node>): string {
	let s = '';
	for (const node of nodes) s += renderNode(node);
	return s;
}

function renderAttribute(attr: Attribute): string {
	return `${attr.nodeName}="${attr.value ?? ''}"`;
}

function renderNode(node: Node): string {
	if (isElement(node)) {
		const tag = node.tagName;
		let attrs = '';
		for (const attr of node.attributes.values()) attrs += ` ${renderAttribute(attr)}`;
		return `<${tag}${attrs}>${renderAll(node.childNodes)}</${tag}>`;
	}
	if (isAttribute(node)) return renderAttribute(node);
	if (isDocument(node)) {
		const doctype = node.doctype !== null ? renderNode(node.doctype) : '';
		const root = node.documentElement !== null ? renderNode(node.documentElement) : '';
		return `${doctype}${renderAll(node.childNodes)}${root}`;
	}
	if (isDocumentType(node)) {
		let s = `<!DOCTYPE ${node.nodeName}`;
		if (node.publicId !== null) s += ` PUBLIC "${node.publicId}"`;
		if (node.systemId !== null) s += ` SYSTEM "${node.systemId}"`;
		if (node.internalSubset !== null) s += ` [${node.internalSubset}]`;
		return `${s}>`;
	}
	if (isProcessingInstruction(node)) {
		return node.data !== null ? `<?${node.target} ${node.data}?>` : `<?${node.target}?>`;
	}

	switch (node.nodeType) {
		case 'text':
			return node.nodeValue ?? '';
		case 'cdata':
			return node.nodeValue !== null ? `<![CDATA[${node.nodeValue}]]>` : '';
		case 'comment':
			return node.nodeValue !== null ? `<!--${node.nodeValue}-->` : '';
		case 'entity-reference':
			return `&${node.nodeName};`;
		case 'document-fragment':
			return renderAll(node.childNodes);
		default:
			return '';
	}
}

/**
 * Render any node.
 *
 * - `Element`               → `<tag a="v">children</tag>`
 * - `Attribute`             → `name="value"`
 * - `Text`                  → the raw value
 * - `CDataSection`          → `<![CDATA[data]]>`
 * - `Comment`               → `<!--data-->`
 * - `ProcessingInstruction` → `<?target data?>`, or `<?target?>` without data
 * - `Document`              → doctype + children + document element
 * - `DocumentType`          → `<!DOCTYPE name PUBLIC "p" SYSTEM "s">`
 * - `EntityReference`       → `&name;`
 * - `DocumentFragment`      → children
 */
export function render(node: Node): string {
	return renderNode(node);
}
