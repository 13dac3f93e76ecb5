/**
 * arbor-dom
 *
 * A mutable, in-memory DOM Core tree for XML documents.
 *
 * Quick start
 * ───────────
 * ```ts
 * import { DOMImplementation } from 'arbor-dom';
 *
 * const doc = new DOMImplementation().createDocument('urn:example:cal', 'calendar');
 * const root = doc.documentElement;
 * root?.setAttribute('xmlns:cal', 'urn:example:cal');
 * root?.appendChild(doc.createElement('event'));
 *
 * String(doc); // '<calendar xmlns:cal="urn:example:cal"><event></event></calendar>'
 * ```
 */

// Factory
export { DOMImplementation, defaultImplementation } from './implementation.ts';

// Names
export { Name, WILDCARD, tagNameMatches, namespacedNameMatches } from './name.ts';

// Errors and logging
export { DomError, isDomError, MSG_INVALID_EXTENSION, MSG_INVALID_NAME, MSG_INVALID_NODE_TYPE, MSG_NO_PARENT_NODE, MSG_REPARENT } from './errors.ts';
export type { DomErrorKind } from './errors.ts';
export { ConsoleLogger, getLogger, setLogger } from './logger.ts';
export type { Logger } from './logger.ts';

// References
export { WeakNodeRef, downgrade } from './refs.ts';

// Node representation
export { NodeImpl } from './node.ts';
export type { Extension } from './node.ts';

// Capability interfaces and type guards
export type {
	NodeType,
	Node,
	CharacterData,
	Text,
	CDataSection,
	Comment,
	ProcessingInstruction,
	Attribute,
	Element,
	Document,
	DocumentFragment,
	DocumentType,
	Entity,
	EntityReference,
	Notation,
} from './types.ts';

export {
	isDocument,
	isDocumentFragment,
	isDocumentType,
	isElement,
	isAttribute,
	isText,
	isCDataSection,
	isComment,
	isCharacterData,
	isProcessingInstruction,
	isEntity,
	isEntityReference,
	isNotation,
} from './types.ts';

export {
	asDocument,
	asDocumentFragment,
	asDocumentType,
	asElement,
	asAttribute,
	asCharacterData,
	asText,
	asCDataSection,
	asComment,
	asProcessingInstruction,
	asEntity,
	asEntityReference,
	asNotation,
} from './convert.ts';

// Tree algorithms
export { isChildAllowed } from './hierarchy.ts';
export { elementsByTagName, elementsByTagNameNS } from './query.ts';
export { render } from './render.ts';

// Reserved names and features
export { XML_NS, XMLNS_NS, FEATURE_CORE, FEATURE_XML, FEATURE_V1, FEATURE_V2, isFeatureSupported } from './syntax.ts';
