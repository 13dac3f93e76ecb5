/**
 * arbor-dom — The node representation
 *
 * One class, `NodeImpl`, stands behind every capability interface. Common
 * state (kind, name, value, parent, owner document, children) lives on the
 * node; whatever only one kind needs lives in its `Extension`. Operations
 * check the kind at run time:
 *
 * • operations that return a result the caller asked for (factories,
 *   insertion, attribute setting, character-data edits) throw `DomError`;
 * • accessors asked of the wrong kind log a warning and return a neutral
 *   value.
 *
 * Ownership
 * ─────────
 * A parent holds its children, a document its doctype and document element,
 * an element its attributes. Every edge pointing the other way is a
 * `WeakNodeRef`.
 */

import { DomError, MSG_INVALID_EXTENSION, MSG_INVALID_NAME, MSG_INVALID_NODE_TYPE, MSG_NO_PARENT_NODE, MSG_REPARENT, isDomError } from './errors.ts';
import { hasNodeValue, isChildAllowed } from './hierarchy.ts';
import { getLogger } from './logger.ts';
import { Name } from './name.ts';
import { elementsByTagName, elementsByTagNameNS } from './query.ts';
import { downgrade } from './refs.ts';
import type { WeakNodeRef } from './refs.ts';
import { render } from './render.ts';
import { CDATA_NODE_NAME, COMMENT_NODE_NAME, DOCUMENT_NODE_NAME, FRAGMENT_NODE_NAME, TEXT_NODE_NAME, XML_NS, XML_PREFIX, XMLNS_NS, XMLNS_PREFIX, isFeatureSupported } from './syntax.ts';
import type { DOMImplementation } from './implementation.ts';
import type {
	Attribute,
	CDataSection,
	Comment,
	Document,
	DocumentFragment,
	DocumentType,
	Element,
	Entity,
	EntityReference,
	Node,
	NodeType,
	Notation,
	ProcessingInstruction,
	Text,
} from './types.ts';

// ---------------------------------------------------------------------------
// Extension state
// ---------------------------------------------------------------------------

interface DocumentState {
	readonly kind: 'document';
	readonly implementation: DOMImplementation;
	doctype: NodeImpl | null;
	documentElement: NodeImpl | null;
}

interface ElementState {
	readonly kind: 'element';
	/** Qualified-name key → attribute, in the order they were first set. */
	readonly attributes: Map<string, NodeImpl>;
	/** Prefix → namespace URI declared on this element; `''` is the default namespace. */
	readonly namespaces: Map<string, string>;
}

interface AttributeState {
	readonly kind: 'attribute';
	ownerElement: WeakNodeRef<NodeImpl> | null;
}

interface DocumentTypeState {
	readonly kind: 'doctype';
	readonly entities: Map<string, NodeImpl>;
	readonly notations: Map<string, NodeImpl>;
	readonly publicId: string | null;
	readonly systemId: string | null;
	readonly internalSubset: string | null;
}

interface EntityState {
	readonly kind: 'entity';
	readonly publicId: string | null;
	readonly systemId: string | null;
	readonly notationName: string | null;
}

interface NotationState {
	readonly kind: 'notation';
	readonly publicId: string | null;
	readonly systemId: string | null;
}

interface NoState {
	readonly kind: 'none';
}

export type Extension = DocumentState | ElementState | AttributeState | DocumentTypeState | EntityState | NotationState | NoState;

const NO_STATE: NoState = { kind: 'none' };

function elementState(): ElementState {
	return { kind: 'element', attributes: new Map(), namespaces: new Map() };
}

function attributeState(): AttributeState {
	return { kind: 'attribute', ownerElement: null };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function warn(message: string, ...attributes: unknown[]): void {
	getLogger().warn(message, ...attributes);
}

function checkOffset(value: number, what: string): void {
	if (!Number.isInteger(value) || value < 0) {
		throw new DomError('IndexSize', `${what} must be a non-negative integer, got ${value}`);
	}
}

function indexSizeError(offset: number, length: number): DomError {
	return new DomError('IndexSize', `offset ${offset} is outside data of length ${length}`);
}

/** The prefix a namespace-declaration attribute binds; `''` for `xmlns` itself. */
function declaredPrefix(name: Name): string {
	return name.prefix === null ? '' : name.localName;
}

// ---------------------------------------------------------------------------
// NodeImpl
// ---------------------------------------------------------------------------

export class NodeImpl
	implements Document, DocumentFragment, DocumentType, Element, Attribute, Text, CDataSection, Comment, ProcessingInstruction, Entity, EntityReference, Notation
{
	readonly nodeType: NodeType;
	readonly name: Name;
	private content: string | null;
	private parent: WeakNodeRef<NodeImpl> | null = null;
	private owner: WeakNodeRef<NodeImpl> | null;
	private readonly children: NodeImpl[] = [];
	private readonly extension: Extension;

	private constructor(nodeType: NodeType, name: Name, value: string | null, ownerDocument: NodeImpl | null, extension: Extension) {
		this.nodeType = nodeType;
		this.name = name;
		this.content = value;
		this.owner = ownerDocument !== null ? downgrade(ownerDocument) : null;
		this.extension = extension;
	}

	// -------------------------------------------------------------------------
	// Construction
	// -------------------------------------------------------------------------

	/** A new, empty document; {@link DOMImplementation.createDocument} adds its root. */
	static newDocument(implementation: DOMImplementation): NodeImpl {
		return new NodeImpl('document', Name.special(DOCUMENT_NODE_NAME), null, null, {
			kind: 'document',
			implementation,
			doctype: null,
			documentElement: null,
		});
	}

	/** A doctype belongs to no document until one adopts it. */
	static newDocumentType(name: Name, publicId: string | null, systemId: string | null, internalSubset: string | null): NodeImpl {
		return new NodeImpl('doctype', name, null, null, {
			kind: 'doctype',
			entities: new Map(),
			notations: new Map(),
			publicId,
			systemId,
			internalSubset,
		});
	}

	/** Narrow a `Node` argument to the implementation class. */
	static from(node: Node): NodeImpl {
		if (node instanceof NodeImpl) return node;
		throw new DomError('InvalidState', `node '${node.nodeName}' was not created by this implementation`);
	}

	// -------------------------------------------------------------------------
	// Node — identity and value
	// -------------------------------------------------------------------------

	get nodeName(): string {
		return this.name.toString();
	}

	get namespaceURI(): string | null {
		return this.name.namespaceURI;
	}

	get prefix(): string | null {
		return this.name.prefix;
	}

	get localName(): string {
		return this.name.localName;
	}

	get nodeValue(): string | null {
		return this.content;
	}

	set nodeValue(value: string | null) {
		if (!hasNodeValue(this.nodeType)) {
			warn(MSG_INVALID_NODE_TYPE, 'nodeValue', this.nodeType);
			return;
		}
		if (this.extension.kind === 'attribute' && this.name.isNamespaceDeclaration()) {
			// A stored declaration rebinds its prefix on the owner element.
			const owner = this.extension.ownerElement?.upgrade() ?? null;
			if (owner !== null && owner.extension.kind === 'element') owner.declareNamespace(owner.extension, this.name, value ?? '');
		}
		this.content = value;
	}

	// -------------------------------------------------------------------------
	// Node — navigation
	// -------------------------------------------------------------------------

	private parentImpl(): NodeImpl | null {
		return this.parent?.upgrade() ?? null;
	}

	private ownerImpl(): NodeImpl | null {
		return this.owner?.upgrade() ?? null;
	}

	/** The document new children of this node must belong to. */
	private contextDocument(): NodeImpl | null {
		return this.extension.kind === 'document' ? this : this.ownerImpl();
	}

	get parentNode(): NodeImpl | null {
		return this.parentImpl();
	}

	get ownerDocument(): NodeImpl | null {
		return this.ownerImpl();
	}

	get childNodes(): ReadonlyArray<NodeImpl> {
		return [...this.children];
	}

	get firstChild(): NodeImpl | null {
		return this.children[0] ?? null;
	}

	get lastChild(): NodeImpl | null {
		return this.children[this.children.length - 1] ?? null;
	}

	private sibling(step: 1 | -1): NodeImpl | null {
		const parent = this.parentImpl();
		if (parent === null) {
			getLogger().debug(MSG_NO_PARENT_NODE, this.nodeName);
			return null;
		}
		const index = parent.children.indexOf(this);
		if (index < 0) return null;
		return parent.children[index + step] ?? null;
	}

	get previousSibling(): NodeImpl | null {
		return this.sibling(-1);
	}

	get nextSibling(): NodeImpl | null {
		return this.sibling(1);
	}

	hasChildNodes(): boolean {
		return this.children.length > 0;
	}

	get attributes(): ReadonlyMap<string, NodeImpl> {
		if (this.extension.kind !== 'element') {
			warn(MSG_INVALID_EXTENSION, 'attributes', this.nodeType);
			return new Map();
		}
		return new Map(this.extension.attributes);
	}

	hasAttributes(): boolean {
		return this.extension.kind === 'element' && this.extension.attributes.size > 0;
	}

	isSupported(feature: string, version: string): boolean {
		return isFeatureSupported(feature, version);
	}

	toString(): string {
		return render(this);
	}

	// -------------------------------------------------------------------------
	// Node — structural mutation
	// -------------------------------------------------------------------------

	private contains(node: NodeImpl): boolean {
		for (let current: NodeImpl | null = node; current !== null; current = current.parentImpl()) {
			if (current === this) return true;
		}
		return false;
	}

	/** Is `child` held in this node's child list or in one of its document slots? */
	private holds(child: NodeImpl): boolean {
		const ext = this.extension;
		if (ext.kind === 'document' && (ext.documentElement === child || ext.doctype === child)) return true;
		return this.children.includes(child);
	}

	/**
	 * Everything that must hold before `child` may become a child of this
	 * node. `replacing` is the node about to leave (its document slot does
	 * not count as taken).
	 */
	private checkInsertion(child: NodeImpl, replacing: NodeImpl | null): void {
		if (child.nodeType === 'attribute') {
			throw new DomError('HierarchyRequest', 'attributes are never tree children');
		}
		if (!isChildAllowed(this.nodeType, child.nodeType)) {
			throw new DomError('HierarchyRequest', `a ${child.nodeType} cannot be a child of a ${this.nodeType}`);
		}
		if (child.contains(this)) {
			throw new DomError('HierarchyRequest', 'a node cannot be inserted into itself or its own subtree');
		}
		const ext = this.extension;
		if (ext.kind === 'document') {
			const slot = child.nodeType === 'element' ? ext.documentElement : child.nodeType === 'doctype' ? ext.doctype : null;
			if (slot !== null && slot !== replacing && slot !== child) {
				throw new DomError('HierarchyRequest', `document already has a ${child.nodeType}`);
			}
		}
		const target = this.contextDocument();
		const current = child.ownerImpl();
		if (target !== null && current !== null && target !== current) {
			throw new DomError('WrongDocument', `'${child.nodeName}' belongs to a different document`);
		}
	}

	/** Remove `child` from this node's child list or slot without touching `child`. */
	private unlink(child: NodeImpl): void {
		const ext = this.extension;
		if (ext.kind === 'document') {
			if (ext.documentElement === child) {
				ext.documentElement = null;
				return;
			}
			if (ext.doctype === child) {
				ext.doctype = null;
				return;
			}
		}
		const index = this.children.indexOf(child);
		if (index >= 0) this.children.splice(index, 1);
	}

	private detach(): void {
		const parent = this.parentImpl();
		if (parent === null) return;
		if (parent.nodeType !== 'document-fragment') getLogger().debug(MSG_REPARENT, this.nodeName, parent.nodeName);
		parent.unlink(this);
		this.parent = null;
	}

	/** Place a detached `child` at `position` (`-1` or past the end appends). */
	private attach(child: NodeImpl, position: number): void {
		const ext = this.extension;
		if (ext.kind === 'document' && child.nodeType === 'element') ext.documentElement = child;
		else if (ext.kind === 'document' && child.nodeType === 'doctype') ext.doctype = child;
		else if (position < 0 || position >= this.children.length) this.children.push(child);
		else this.children.splice(position, 0, child);
		child.parent = downgrade(this);
		const document = this.contextDocument();
		if (document !== null) child.adoptInto(document);
	}

	/** Point this node and everything it holds at `document`. */
	private adoptInto(document: NodeImpl): void {
		if (this.nodeType === 'document' || this.owner?.refersTo(document)) return;
		this.owner = downgrade(document);
		for (const child of this.children) child.adoptInto(document);
		const ext = this.extension;
		if (ext.kind === 'element') for (const attr of ext.attributes.values()) attr.adoptInto(document);
		if (ext.kind === 'doctype') {
			for (const entity of ext.entities.values()) entity.adoptInto(document);
			for (const notation of ext.notations.values()) notation.adoptInto(document);
		}
	}

	/** The nodes a `newChild` argument stands for: a fragment's children, or the node itself. */
	private insertionSet(node: NodeImpl, replacing: NodeImpl | null): NodeImpl[] {
		const nodes = node.nodeType === 'document-fragment' ? [...node.children] : [node];
		for (const n of nodes) this.checkInsertion(n, replacing);
		if (this.extension.kind === 'document' && nodes.length > 1) {
			for (const kind of ['element', 'doctype'] as const) {
				if (nodes.filter((n) => n.nodeType === kind).length > 1) {
					throw new DomError('HierarchyRequest', `a document holds at most one ${kind}`);
				}
			}
		}
		return nodes;
	}

	insertBefore(newChild: Node, refChild?: Node | null): NodeImpl {
		const child = NodeImpl.from(newChild);
		const nodes = this.insertionSet(child, null);
		// Inserting a node before itself keeps it where it is.
		const ref = refChild === child ? child.nextSibling : refChild;
		for (const n of nodes) n.detach();
		let position = ref == null ? -1 : this.children.indexOf(NodeImpl.from(ref));
		for (const n of nodes) {
			this.attach(n, position);
			if (position >= 0) position++;
		}
		return child;
	}

	appendChild(newChild: Node): NodeImpl {
		return this.insertBefore(newChild, null);
	}

	replaceChild(newChild: Node, oldChild: Node): NodeImpl {
		const replacement = NodeImpl.from(newChild);
		const old = NodeImpl.from(oldChild);
		if (!this.holds(old)) {
			throw new DomError('NotFound', `'${old.nodeName}' is not a child of '${this.nodeName}'`);
		}
		if (replacement === old) return old;
		const nodes = this.insertionSet(replacement, old);
		for (const n of nodes) n.detach();
		let position = this.children.indexOf(old);
		this.unlink(old);
		old.parent = null;
		for (const n of nodes) {
			this.attach(n, position);
			if (position >= 0) position++;
		}
		return old;
	}

	removeChild(oldChild: Node): NodeImpl {
		const old = NodeImpl.from(oldChild);
		if (!this.holds(old)) {
			throw new DomError('NotFound', `'${old.nodeName}' is not a child of '${this.nodeName}'`);
		}
		this.unlink(old);
		old.parent = null;
		return old;
	}

	// -------------------------------------------------------------------------
	// Node — cloning and normalization
	// -------------------------------------------------------------------------

	cloneNode(deep: boolean): NodeImpl {
		const ext = this.extension;
		if (ext.kind !== 'document') return this.cloneInto(this.ownerImpl(), deep);

		const copy = NodeImpl.newDocument(ext.implementation);
		if (deep) {
			if (ext.doctype !== null) copy.attach(ext.doctype.cloneInto(copy, true), -1);
			for (const child of this.children) copy.attach(child.cloneInto(copy, true), -1);
			if (ext.documentElement !== null) copy.attach(ext.documentElement.cloneInto(copy, true), -1);
		}
		return copy;
	}

	private cloneInto(document: NodeImpl | null, deep: boolean): NodeImpl {
		const copy = new NodeImpl(this.nodeType, this.name, this.content, document, this.cloneExtension(document));
		if (copy.extension.kind === 'element') {
			for (const attr of copy.extension.attributes.values()) {
				if (attr.extension.kind === 'attribute') attr.extension.ownerElement = downgrade(copy);
			}
		}
		if (deep) for (const child of this.children) copy.attach(child.cloneInto(document, true), -1);
		return copy;
	}

	private cloneExtension(document: NodeImpl | null): Extension {
		const ext = this.extension;
		switch (ext.kind) {
			case 'element': {
				const attributes = new Map<string, NodeImpl>();
				for (const [key, attr] of ext.attributes) attributes.set(key, attr.cloneInto(document, true));
				return { kind: 'element', attributes, namespaces: new Map(ext.namespaces) };
			}
			case 'attribute':
				return attributeState();
			case 'doctype': {
				const entities = new Map<string, NodeImpl>();
				for (const [key, entity] of ext.entities) entities.set(key, entity.cloneInto(document, true));
				const notations = new Map<string, NodeImpl>();
				for (const [key, notation] of ext.notations) notations.set(key, notation.cloneInto(document, true));
				return { ...ext, entities, notations };
			}
			case 'document':
				throw new DomError('InvalidState', 'documents are cloned through cloneNode');
			default:
				return ext;
		}
	}

	/** Merge adjacent Text children and drop empty ones, throughout the subtree. */
	normalize(): void {
		const ext = this.extension;
		if (ext.kind === 'element') for (const attr of ext.attributes.values()) attr.normalize();
		if (ext.kind === 'document' && ext.documentElement !== null) ext.documentElement.normalize();

		let index = 0;
		while (index < this.children.length) {
			const child = this.children[index];
			if (child.nodeType !== 'text') {
				child.normalize();
				index++;
				continue;
			}
			let next = this.children[index + 1];
			while (next !== undefined && next.nodeType === 'text') {
				child.content = (child.content ?? '') + (next.content ?? '');
				this.removeChild(next);
				next = this.children[index + 1];
			}
			if ((child.content ?? '') === '') this.removeChild(child);
			else index++;
		}
	}

	// -------------------------------------------------------------------------
	// Document
	// -------------------------------------------------------------------------

	private documentState(operation: string): DocumentState {
		if (this.extension.kind !== 'document') {
			warn(MSG_INVALID_NODE_TYPE, operation, this.nodeType);
			throw new DomError('InvalidState', `${operation} is only available on a document`);
		}
		return this.extension;
	}

	get doctype(): NodeImpl | null {
		if (this.extension.kind !== 'document') {
			warn(MSG_INVALID_EXTENSION, 'doctype', this.nodeType);
			return null;
		}
		return this.extension.doctype;
	}

	get documentElement(): NodeImpl | null {
		if (this.extension.kind !== 'document') {
			warn(MSG_INVALID_EXTENSION, 'documentElement', this.nodeType);
			return null;
		}
		return this.extension.documentElement;
	}

	get implementation(): DOMImplementation {
		const document = this.contextDocument();
		if (document === null || document.extension.kind !== 'document') {
			throw new DomError('InvalidState', `'${this.nodeName}' has no owner document`);
		}
		return document.extension.implementation;
	}

	createElement(tagName: string): NodeImpl {
		this.documentState('createElement');
		return new NodeImpl('element', Name.parse(tagName), null, this, elementState());
	}

	createElementNS(namespaceURI: string | null, qualifiedName: string): NodeImpl {
		this.documentState('createElementNS');
		return new NodeImpl('element', Name.fromNamespace(namespaceURI, qualifiedName), null, this, elementState());
	}

	createAttribute(name: string): NodeImpl {
		this.documentState('createAttribute');
		return new NodeImpl('attribute', Name.parse(name), null, this, attributeState());
	}

	createAttributeWith(name: string, value: string): NodeImpl {
		this.documentState('createAttributeWith');
		return new NodeImpl('attribute', Name.parse(name), value, this, attributeState());
	}

	createAttributeNS(namespaceURI: string | null, qualifiedName: string): NodeImpl {
		this.documentState('createAttributeNS');
		return new NodeImpl('attribute', Name.fromNamespace(namespaceURI, qualifiedName), null, this, attributeState());
	}

	createTextNode(data: string): NodeImpl {
		this.documentState('createTextNode');
		return new NodeImpl('text', Name.special(TEXT_NODE_NAME), data, this, NO_STATE);
	}

	createComment(data: string): NodeImpl {
		this.documentState('createComment');
		return new NodeImpl('comment', Name.special(COMMENT_NODE_NAME), data, this, NO_STATE);
	}

	createCDATASection(data: string): NodeImpl {
		this.documentState('createCDATASection');
		return new NodeImpl('cdata', Name.special(CDATA_NODE_NAME), data, this, NO_STATE);
	}

	createDocumentFragment(): NodeImpl {
		this.documentState('createDocumentFragment');
		return new NodeImpl('document-fragment', Name.special(FRAGMENT_NODE_NAME), null, this, NO_STATE);
	}

	createEntityReference(name: string): NodeImpl {
		this.documentState('createEntityReference');
		return new NodeImpl('entity-reference', Name.parse(name), null, this, NO_STATE);
	}

	createProcessingInstruction(target: string, data?: string | null): NodeImpl {
		this.documentState('createProcessingInstruction');
		return new NodeImpl('processing-instruction', Name.parse(target), data ?? null, this, NO_STATE);
	}

	createEntity(name: string, publicId?: string | null, systemId?: string | null, notationName?: string | null): NodeImpl {
		this.documentState('createEntity');
		return new NodeImpl('entity', Name.parse(name), null, this, {
			kind: 'entity',
			publicId: publicId ?? null,
			systemId: systemId ?? null,
			notationName: notationName ?? null,
		});
	}

	createNotation(name: string, publicId?: string | null, systemId?: string | null): NodeImpl {
		this.documentState('createNotation');
		return new NodeImpl('notation', Name.parse(name), null, this, {
			kind: 'notation',
			publicId: publicId ?? null,
			systemId: systemId ?? null,
		});
	}

	getElementById(_id: string): NodeImpl | null {
		// Which attributes are IDs is declared by a DTD or schema; this tree
		// has neither, so it never guesses (e.g. from attributes named "id").
		return null;
	}

	getElementsByTagName(tagName: string): Element[] {
		const ext = this.extension;
		if (ext.kind === 'document') return ext.documentElement !== null ? ext.documentElement.getElementsByTagName(tagName) : [];
		if (ext.kind === 'element') return elementsByTagName(this, tagName);
		warn(MSG_INVALID_NODE_TYPE, 'getElementsByTagName', this.nodeType);
		return [];
	}

	getElementsByTagNameNS(namespaceURI: string, localName: string): Element[] {
		const ext = this.extension;
		if (ext.kind === 'document') return ext.documentElement !== null ? ext.documentElement.getElementsByTagNameNS(namespaceURI, localName) : [];
		if (ext.kind === 'element') return elementsByTagNameNS(this, namespaceURI, localName);
		warn(MSG_INVALID_NODE_TYPE, 'getElementsByTagNameNS', this.nodeType);
		return [];
	}

	// -------------------------------------------------------------------------
	// Element
	// -------------------------------------------------------------------------

	get tagName(): string {
		return this.name.toString();
	}

	/** Element state for a lenient accessor; warns and yields `null` elsewhere. */
	private elementStateOrWarn(operation: string): ElementState | null {
		if (this.extension.kind === 'element') return this.extension;
		warn(MSG_INVALID_NODE_TYPE, operation, this.nodeType);
		return null;
	}

	/** Parse `qualifiedName` for a lenient accessor; warns and yields `null` when invalid. */
	private nameOrWarn(qualifiedName: string): Name | null {
		try {
			return Name.parse(qualifiedName);
		} catch (e) {
			if (!isDomError(e)) throw e;
			warn(MSG_INVALID_NAME, qualifiedName, e.message);
			return null;
		}
	}

	/** The namespace an attribute name stands for on this element. */
	private attributeNamespace(name: Name): string | null {
		if (name.namespaceURI !== null || name.prefix === null) return name.namespaceURI;
		return this.lookupNamespaceURI(name.prefix);
	}

	private findAttributeNS(state: ElementState, namespaceURI: string | null, localName: string): NodeImpl | null {
		const uri = namespaceURI === '' ? null : namespaceURI;
		for (const attr of state.attributes.values()) {
			if (attr.name.localName === localName && this.attributeNamespace(attr.name) === uri) return attr;
		}
		return null;
	}

	getAttributeNode(name: string): NodeImpl | null {
		const state = this.elementStateOrWarn('getAttributeNode');
		const parsed = state !== null ? this.nameOrWarn(name) : null;
		if (state === null || parsed === null) return null;
		return state.attributes.get(parsed.key) ?? null;
	}

	getAttribute(name: string): string | null {
		return this.getAttributeNode(name)?.value ?? null;
	}

	hasAttribute(name: string): boolean {
		return this.getAttributeNode(name) !== null;
	}

	setAttribute(name: string, value: string): void {
		const attr = new NodeImpl('attribute', Name.parse(name), value, this.ownerImpl(), attributeState());
		this.setAttributeNode(attr);
	}

	/** Validate that `attr` may be set on this element; returns both states. */
	private checkAttribute(attr: NodeImpl): [ElementState, AttributeState] {
		const state = this.extension;
		const attrState = attr.extension;
		if (state.kind !== 'element' || attrState.kind !== 'attribute') {
			warn(MSG_INVALID_NODE_TYPE, 'setAttributeNode', this.nodeType, attr.nodeType);
			throw new DomError('InvalidState', 'setAttributeNode needs an element and an attribute');
		}
		const ownerElement = attrState.ownerElement?.upgrade() ?? null;
		if (ownerElement !== null && ownerElement !== this) {
			throw new DomError('InvalidState', `attribute '${attr.nodeName}' is already in use on another element`);
		}
		const document = this.ownerImpl();
		const attrDocument = attr.ownerImpl();
		if (document !== null && attrDocument !== null && document !== attrDocument) {
			throw new DomError('WrongDocument', `attribute '${attr.nodeName}' belongs to a different document`);
		}
		return [state, attrState];
	}

	/**
	 * Record the binding a namespace-declaration attribute makes.
	 * Throws `Namespace` for bindings XML Namespaces forbids.
	 */
	private declareNamespace(state: ElementState, name: Name, uri: string): void {
		const prefix = declaredPrefix(name);
		if (prefix === XMLNS_PREFIX || uri === XMLNS_NS) {
			throw new DomError('Namespace', `'${XMLNS_PREFIX}' and ${XMLNS_NS} cannot be declared`);
		}
		if ((prefix === XML_PREFIX) !== (uri === XML_NS)) {
			throw new DomError('Namespace', `prefix '${XML_PREFIX}' is bound to ${XML_NS} only`);
		}
		if (uri === '') {
			if (prefix !== '') throw new DomError('Namespace', `prefix '${prefix}' cannot be bound to the empty namespace`);
			state.namespaces.delete('');
			return;
		}
		state.namespaces.set(prefix, uri);
	}

	private storeAttribute(state: ElementState, attrState: AttributeState, attr: NodeImpl): NodeImpl {
		if (attr.name.isNamespaceDeclaration()) this.declareNamespace(state, attr.name, attr.value ?? '');
		const key = attr.name.key;
		const previous = state.attributes.get(key);
		if (previous !== undefined && previous !== attr && previous.extension.kind === 'attribute') {
			previous.extension.ownerElement = null;
		}
		state.attributes.set(key, attr);
		attrState.ownerElement = downgrade(this);
		return attr;
	}

	setAttributeNode(attribute: Node): NodeImpl {
		const attr = NodeImpl.from(attribute);
		const [state, attrState] = this.checkAttribute(attr);
		return this.storeAttribute(state, attrState, attr);
	}

	private dropAttribute(state: ElementState, attr: NodeImpl): void {
		state.attributes.delete(attr.name.key);
		if (attr.extension.kind === 'attribute') attr.extension.ownerElement = null;
		if (attr.name.isNamespaceDeclaration()) state.namespaces.delete(declaredPrefix(attr.name));
	}

	removeAttribute(name: string): void {
		const attr = this.getAttributeNode(name);
		if (attr !== null && this.extension.kind === 'element') this.dropAttribute(this.extension, attr);
	}

	removeAttributeNode(attribute: Node): NodeImpl {
		const attr = NodeImpl.from(attribute);
		const state = this.extension;
		if (state.kind !== 'element' || attr.nodeType !== 'attribute') {
			warn(MSG_INVALID_NODE_TYPE, 'removeAttributeNode', this.nodeType, attr.nodeType);
			throw new DomError('InvalidState', 'removeAttributeNode needs an element and an attribute');
		}
		if (state.attributes.get(attr.name.key) !== attr) {
			throw new DomError('NotFound', `attribute '${attr.nodeName}' is not set on '${this.nodeName}'`);
		}
		this.dropAttribute(state, attr);
		return attr;
	}

	getAttributeNodeNS(namespaceURI: string | null, localName: string): NodeImpl | null {
		const state = this.elementStateOrWarn('getAttributeNodeNS');
		return state !== null ? this.findAttributeNS(state, namespaceURI, localName) : null;
	}

	getAttributeNS(namespaceURI: string | null, localName: string): string | null {
		return this.getAttributeNodeNS(namespaceURI, localName)?.value ?? null;
	}

	hasAttributeNS(namespaceURI: string | null, localName: string): boolean {
		return this.getAttributeNodeNS(namespaceURI, localName) !== null;
	}

	setAttributeNS(namespaceURI: string | null, qualifiedName: string, value: string): void {
		const attr = new NodeImpl('attribute', Name.fromNamespace(namespaceURI, qualifiedName), value, this.ownerImpl(), attributeState());
		this.setAttributeNodeNS(attr);
	}

	/** Like {@link setAttributeNode}, replacing any attribute with the same namespace and local name. */
	setAttributeNodeNS(attribute: Node): NodeImpl {
		const attr = NodeImpl.from(attribute);
		const [state, attrState] = this.checkAttribute(attr);
		const existing = this.findAttributeNS(state, attr.namespaceURI, attr.localName);
		if (existing !== null && existing !== attr && existing.name.key !== attr.name.key) this.dropAttribute(state, existing);
		return this.storeAttribute(state, attrState, attr);
	}

	removeAttributeNS(namespaceURI: string | null, localName: string): void {
		const attr = this.getAttributeNodeNS(namespaceURI, localName);
		if (attr !== null && this.extension.kind === 'element') this.dropAttribute(this.extension, attr);
	}

	/** Where namespace lookups start: an attribute resolves through its owner element. */
	private namespaceScope(): NodeImpl | null {
		if (this.extension.kind === 'attribute') return this.extension.ownerElement?.upgrade() ?? null;
		return this;
	}

	lookupNamespaceURI(prefix: string | null): string | null {
		if (prefix === XML_PREFIX) return XML_NS;
		if (prefix === XMLNS_PREFIX) return XMLNS_NS;
		const key = prefix ?? '';
		for (let node = this.namespaceScope(); node !== null; node = node.parentImpl()) {
			if (node.extension.kind !== 'element') continue;
			const uri = node.extension.namespaces.get(key);
			if (uri !== undefined) return uri;
		}
		return null;
	}

	lookupPrefix(namespaceURI: string): string | null {
		if (namespaceURI === XML_NS) return XML_PREFIX;
		if (namespaceURI === XMLNS_NS) return XMLNS_PREFIX;
		for (let node = this.namespaceScope(); node !== null; node = node.parentImpl()) {
			if (node.extension.kind !== 'element') continue;
			for (const [prefix, uri] of node.extension.namespaces) {
				if (prefix !== '' && uri === namespaceURI) return prefix;
			}
		}
		return null;
	}

	// -------------------------------------------------------------------------
	// Attribute
	// -------------------------------------------------------------------------

	get value(): string | null {
		if (this.nodeType !== 'attribute') {
			warn(MSG_INVALID_NODE_TYPE, 'value', this.nodeType);
			return null;
		}
		return this.content;
	}

	set value(value: string | null) {
		if (this.nodeType !== 'attribute') {
			warn(MSG_INVALID_NODE_TYPE, 'value', this.nodeType);
			return;
		}
		this.nodeValue = value;
	}

	get specified(): boolean {
		return this.nodeType === 'attribute';
	}

	get ownerElement(): NodeImpl | null {
		if (this.extension.kind !== 'attribute') {
			warn(MSG_INVALID_EXTENSION, 'ownerElement', this.nodeType);
			return null;
		}
		return this.extension.ownerElement?.upgrade() ?? null;
	}

	// -------------------------------------------------------------------------
	// CharacterData and ProcessingInstruction
	// -------------------------------------------------------------------------

	private isCharacterData(): boolean {
		return this.nodeType === 'text' || this.nodeType === 'cdata' || this.nodeType === 'comment';
	}

	private requireCharacterData(operation: string): void {
		if (!this.isCharacterData()) {
			warn(MSG_INVALID_NODE_TYPE, operation, this.nodeType);
			throw new DomError('Syntax', `${operation} is only available on text, CDATA and comment nodes`);
		}
	}

	get data(): string | null {
		if (!this.isCharacterData() && this.nodeType !== 'processing-instruction') {
			warn(MSG_INVALID_NODE_TYPE, 'data', this.nodeType);
			return null;
		}
		return this.nodeValue;
	}

	set data(data: string | null) {
		if (!this.isCharacterData() && this.nodeType !== 'processing-instruction') {
			warn(MSG_INVALID_NODE_TYPE, 'data', this.nodeType);
			return;
		}
		this.nodeValue = data;
	}

	get length(): number {
		return this.data?.length ?? 0;
	}

	get target(): string {
		if (this.nodeType !== 'processing-instruction') {
			warn(MSG_INVALID_NODE_TYPE, 'target', this.nodeType);
			return '';
		}
		return this.name.toString();
	}

	substringData(offset: number, count: number): string {
		this.requireCharacterData('substringData');
		if (offset + count === offset) return '';
		checkOffset(offset, 'offset');
		checkOffset(count, 'count');
		const data = this.content;
		if (data === null || offset >= data.length) throw indexSizeError(offset, data?.length ?? 0);
		return offset + count >= data.length ? data.slice(offset) : data.slice(offset, offset + count);
	}

	appendData(data: string): void {
		this.requireCharacterData('appendData');
		if (data.length === 0) return;
		this.content = (this.content ?? '') + data;
	}

	insertData(offset: number, data: string): void {
		this.requireCharacterData('insertData');
		if (data.length === 0) return;
		this.replaceData(offset, 0, data);
	}

	deleteData(offset: number, count: number): void {
		this.requireCharacterData('deleteData');
		if (offset + count === offset) return;
		this.replaceData(offset, count, '');
	}

	/**
	 * Replace `count` units from `offset` with `data`; a range running past
	 * the end stops at the end. With no current data (or empty data) only
	 * `offset + count === 0` is accepted, and sets the data outright.
	 */
	replaceData(offset: number, count: number, data: string): void {
		this.requireCharacterData('replaceData');
		checkOffset(offset, 'offset');
		checkOffset(count, 'count');
		const current = this.content;
		if (current === null || current.length === 0) {
			if (offset + count !== 0) throw indexSizeError(offset, 0);
			this.content = data;
			return;
		}
		if (offset >= current.length) throw indexSizeError(offset, current.length);
		const end = Math.min(offset + count, current.length);
		this.content = current.slice(0, offset) + data + current.slice(end);
	}

	// -------------------------------------------------------------------------
	// Text and CDATA
	// -------------------------------------------------------------------------

	splitText(offset: number): NodeImpl {
		if (this.nodeType !== 'text' && this.nodeType !== 'cdata') {
			warn(MSG_INVALID_NODE_TYPE, 'splitText', this.nodeType);
			throw new DomError('Syntax', 'splitText is only available on text and CDATA nodes');
		}
		checkOffset(offset, 'offset');
		const length = this.length;
		let tail = '';
		if (offset < length) {
			tail = this.substringData(offset, length - offset);
			this.deleteData(offset, length - offset);
		}
		const sibling = new NodeImpl(this.nodeType, this.name, tail, this.ownerImpl(), NO_STATE);
		const parent = this.parentImpl();
		if (parent !== null) parent.insertBefore(sibling, this.nextSibling);
		return sibling;
	}

	// -------------------------------------------------------------------------
	// DocumentType, Entity, Notation
	// -------------------------------------------------------------------------

	private externalIds(operation: string): DocumentTypeState | EntityState | NotationState | null {
		const ext = this.extension;
		if (ext.kind === 'doctype' || ext.kind === 'entity' || ext.kind === 'notation') return ext;
		warn(MSG_INVALID_EXTENSION, operation, this.nodeType);
		return null;
	}

	get publicId(): string | null {
		return this.externalIds('publicId')?.publicId ?? null;
	}

	get systemId(): string | null {
		return this.externalIds('systemId')?.systemId ?? null;
	}

	get internalSubset(): string | null {
		if (this.extension.kind !== 'doctype') {
			warn(MSG_INVALID_EXTENSION, 'internalSubset', this.nodeType);
			return null;
		}
		return this.extension.internalSubset;
	}

	get notationName(): string | null {
		if (this.extension.kind !== 'entity') {
			warn(MSG_INVALID_EXTENSION, 'notationName', this.nodeType);
			return null;
		}
		return this.extension.notationName;
	}

	get entities(): ReadonlyMap<string, NodeImpl> {
		if (this.extension.kind !== 'doctype') {
			warn(MSG_INVALID_EXTENSION, 'entities', this.nodeType);
			return new Map();
		}
		return new Map(this.extension.entities);
	}

	get notations(): ReadonlyMap<string, NodeImpl> {
		if (this.extension.kind !== 'doctype') {
			warn(MSG_INVALID_EXTENSION, 'notations', this.nodeType);
			return new Map();
		}
		return new Map(this.extension.notations);
	}

	private declare(kind: 'entity' | 'notation', node: Node): NodeImpl {
		const declared = NodeImpl.from(node);
		const ext = this.extension;
		if (ext.kind !== 'doctype' || declared.nodeType !== kind) {
			warn(MSG_INVALID_NODE_TYPE, kind, this.nodeType, declared.nodeType);
			throw new DomError('InvalidState', `only a doctype can declare a ${kind}`);
		}
		const document = this.ownerImpl();
		const declaredDocument = declared.ownerImpl();
		if (document !== null && declaredDocument !== null && document !== declaredDocument) {
			throw new DomError('WrongDocument', `${kind} '${declared.nodeName}' belongs to a different document`);
		}
		(kind === 'entity' ? ext.entities : ext.notations).set(declared.name.key, declared);
		if (document !== null) declared.adoptInto(document);
		return declared;
	}

	addEntity(entity: Node): NodeImpl {
		return this.declare('entity', entity);
	}

	addNotation(notation: Node): NodeImpl {
		return this.declare('notation', notation);
	}
}
