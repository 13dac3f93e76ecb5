/**
 * arbor-dom — DOMImplementation
 *
 * The entry point for new trees. It holds no state, so any number of
 * instances may exist; each document remembers the one that created it.
 */

import { Name } from './name.ts';
import { NodeImpl } from './node.ts';
import { isFeatureSupported } from './syntax.ts';
import type { Document, DocumentType } from './types.ts';

export class DOMImplementation {
	/**
	 * Create a document whose document element is named `qualifiedName` in
	 * `namespaceURI`, optionally adopting `doctype`.
	 *
	 * The root element is made by the new document's own `createElementNS`,
	 * so its owner document is the document being returned.
	 */
	createDocument(namespaceURI: string | null, qualifiedName: string, doctype?: DocumentType | null): Document {
		Name.fromNamespace(namespaceURI, qualifiedName);
		const document = NodeImpl.newDocument(this);
		if (doctype != null) document.appendChild(doctype);
		document.appendChild(document.createElementNS(namespaceURI, qualifiedName));
		return document;
	}

	createDocumentType(qualifiedName: string, publicId?: string | null, systemId?: string | null, internalSubset?: string | null): DocumentType {
		return NodeImpl.newDocumentType(Name.parse(qualifiedName), publicId ?? null, systemId ?? null, internalSubset ?? null);
	}

	/** `Core` and `XML`, versions `1.0` and `2.0`. */
	hasFeature(feature: string, version: string): boolean {
		return isFeatureSupported(feature, version);
	}
}

/** Shared instance for callers that have no reason to construct their own. */
export const defaultImplementation = new DOMImplementation();
