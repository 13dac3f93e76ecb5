/**
 * arbor-dom — Capability interfaces
 *
 * Every node is one `NodeImpl`; the interfaces below describe what a node of
 * a given kind can do. Use the type guards (or the logging `as*` helpers in
 * convert.ts) to move from `Node` to a narrower capability.
 *
 *   Node
 *   ├── Document
 *   ├── DocumentFragment
 *   ├── DocumentType
 *   ├── Element
 *   ├── Attribute
 *   ├── CharacterData
 *   │   ├── Text
 *   │   │   └── CDataSection
 *   │   └── Comment
 *   ├── ProcessingInstruction
 *   ├── Entity
 *   ├── EntityReference
 *   └── Notation
 */

import type { Name } from './name.ts';
import type { DOMImplementation } from './implementation.ts';

// ---------------------------------------------------------------------------
// Discriminant
// ---------------------------------------------------------------------------

/** All legal values of `node.nodeType`. */
export type NodeType =
	| 'element'
	| 'attribute'
	| 'text'
	| 'cdata'
	| 'entity-reference'
	| 'entity'
	| 'processing-instruction'
	| 'comment'
	| 'document'
	| 'doctype'
	| 'document-fragment'
	| 'notation';

// ---------------------------------------------------------------------------
// Base
// ---------------------------------------------------------------------------

export interface Node {
	readonly nodeType: NodeType;
	readonly name: Name;
	/** Qualified name, or `#text` / `#comment` / … for unnamed kinds. */
	readonly nodeName: string;
	readonly namespaceURI: string | null;
	readonly prefix: string | null;
	readonly localName: string;
	/**
	 * The value of Attribute, Text, CDATA, Comment and PI nodes; `null` for
	 * every other kind, where assignments are ignored.
	 */
	nodeValue: string | null;

	readonly parentNode: Node | null;
	/** A snapshot of the children in document order. */
	readonly childNodes: ReadonlyArray<Node>;
	readonly firstChild: Node | null;
	readonly lastChild: Node | null;
	readonly previousSibling: Node | null;
	readonly nextSibling: Node | null;
	/** A snapshot of an element's attributes keyed by qualified name. */
	readonly attributes: ReadonlyMap<string, Attribute>;
	/** The creating document; `null` for documents and unattached doctypes. */
	readonly ownerDocument: Document | null;

	insertBefore(newChild: Node, refChild?: Node | null): Node;
	replaceChild(newChild: Node, oldChild: Node): Node;
	removeChild(oldChild: Node): Node;
	appendChild(newChild: Node): Node;
	hasChildNodes(): boolean;
	cloneNode(deep: boolean): Node;
	normalize(): void;
	isSupported(feature: string, version: string): boolean;
	hasAttributes(): boolean;
	toString(): string;
}

// ---------------------------------------------------------------------------
// Character data
// ---------------------------------------------------------------------------

/**
 * Shared by Text, CDATA and Comment. Offsets and counts are UTF-16 code
 * units, the same units `String.prototype.length` counts.
 */
export interface CharacterData extends Node {
	data: string | null;
	readonly length: number;
	substringData(offset: number, count: number): string;
	appendData(data: string): void;
	insertData(offset: number, data: string): void;
	deleteData(offset: number, count: number): void;
	replaceData(offset: number, count: number, data: string): void;
}

export interface Text extends CharacterData {
	/**
	 * Split at `offset`; the tail moves into a new node of the same kind,
	 * inserted as the next sibling when this node has a parent.
	 */
	splitText(offset: number): Text;
}

export interface CDataSection extends Text {}

export interface Comment extends CharacterData {}

export interface ProcessingInstruction extends Node {
	readonly target: string;
	data: string | null;
	readonly length: number;
}

// ---------------------------------------------------------------------------
// Attributes and elements
// ---------------------------------------------------------------------------

export interface Attribute extends Node {
	value: string | null;
	/** Always `true`; there are no DTD defaults to fall back on. */
	readonly specified: boolean;
	readonly ownerElement: Element | null;
}

export interface Element extends Node {
	readonly tagName: string;

	getAttribute(name: string): string | null;
	setAttribute(name: string, value: string): void;
	removeAttribute(name: string): void;
	hasAttribute(name: string): boolean;
	getAttributeNode(name: string): Attribute | null;
	setAttributeNode(attribute: Attribute): Attribute;
	removeAttributeNode(attribute: Attribute): Attribute;

	getAttributeNS(namespaceURI: string | null, localName: string): string | null;
	setAttributeNS(namespaceURI: string | null, qualifiedName: string, value: string): void;
	removeAttributeNS(namespaceURI: string | null, localName: string): void;
	hasAttributeNS(namespaceURI: string | null, localName: string): boolean;
	getAttributeNodeNS(namespaceURI: string | null, localName: string): Attribute | null;
	setAttributeNodeNS(attribute: Attribute): Attribute;

	/** This element and its descendant elements, pre-order, matching `tagName` (`*` for all). */
	getElementsByTagName(tagName: string): Element[];
	getElementsByTagNameNS(namespaceURI: string, localName: string): Element[];

	/** The URI bound to `prefix` (`null` for the default namespace) here or on an ancestor. */
	lookupNamespaceURI(prefix: string | null): string | null;
	lookupPrefix(namespaceURI: string): string | null;
}

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

export interface Document extends Node {
	readonly doctype: DocumentType | null;
	readonly documentElement: Element | null;
	readonly implementation: DOMImplementation;

	createElement(tagName: string): Element;
	createElementNS(namespaceURI: string | null, qualifiedName: string): Element;
	createAttribute(name: string): Attribute;
	createAttributeWith(name: string, value: string): Attribute;
	createAttributeNS(namespaceURI: string | null, qualifiedName: string): Attribute;
	createTextNode(data: string): Text;
	createComment(data: string): Comment;
	createCDATASection(data: string): CDataSection;
	createDocumentFragment(): DocumentFragment;
	createEntityReference(name: string): EntityReference;
	createProcessingInstruction(target: string, data?: string | null): ProcessingInstruction;
	createEntity(name: string, publicId?: string | null, systemId?: string | null, notationName?: string | null): Entity;
	createNotation(name: string, publicId?: string | null, systemId?: string | null): Notation;

	/** Always `null`: without a DTD no attribute is known to be an ID. */
	getElementById(id: string): Element | null;
	getElementsByTagName(tagName: string): Element[];
	getElementsByTagNameNS(namespaceURI: string, localName: string): Element[];
}

export interface DocumentFragment extends Node {}

export interface DocumentType extends Node {
	readonly publicId: string | null;
	readonly systemId: string | null;
	readonly internalSubset: string | null;
	readonly entities: ReadonlyMap<string, Entity>;
	readonly notations: ReadonlyMap<string, Notation>;
	addEntity(entity: Entity): Entity;
	addNotation(notation: Notation): Notation;
}

export interface Entity extends Node {
	readonly publicId: string | null;
	readonly systemId: string | null;
	readonly notationName: string | null;
}

export interface EntityReference extends Node {}

export interface Notation extends Node {
	readonly publicId: string | null;
	readonly systemId: string | null;
}

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

export function isDocument(node: Node): node is Document {
	return node.nodeType === 'document';
}

export function isDocumentFragment(node: Node): node is DocumentFragment {
	return node.nodeType === 'document-fragment';
}

export function isDocumentType(node: Node): node is DocumentType {
	return node.nodeType === 'doctype';
}

export function isElement(node: Node): node is Element {
	return node.nodeType === 'element';
}

export function isAttribute(node: Node): node is Attribute {
	return node.nodeType === 'attribute';
}

/** Text or CDATA: both support `splitText`. */
export function isText(node: Node): node is Text {
	return node.nodeType === 'text' || node.nodeType === 'cdata';
}

export function isCDataSection(node: Node): node is CDataSection {
	return node.nodeType === 'cdata';
}

export function isComment(node: Node): node is Comment {
	return node.nodeType === 'comment';
}

export function isCharacterData(node: Node): node is CharacterData {
	return isText(node) || isComment(node);
}

export function isProcessingInstruction(node: Node): node is ProcessingInstruction {
	return node.nodeType === 'processing-instruction';
}

export function isEntity(node: Node): node is Entity {
	return node.nodeType === 'entity';
}

export function isEntityReference(node: Node): node is EntityReference {
	return node.nodeType === 'entity-reference';
}

export function isNotation(node: Node): node is Notation {
	return node.nodeType === 'notation';
}
