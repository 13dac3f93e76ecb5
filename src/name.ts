/**
 * arbor-dom — Qualified names
 *
 * A `Name` is an immutable (prefix, local name, namespace URI) triple.
 * Equality looks at prefix and local name only; the string form is the
 * qualified name exactly as it appears in markup (`prefix:local`).
 */

import { isNCName, isXmlName } from './chars.ts';
import { DomError } from './errors.ts';
import { XML_NS, XML_PREFIX, XMLNS_NS, XMLNS_PREFIX } from './syntax.ts';
import type { SpecialNodeName } from './syntax.ts';

/** Matches any value in tag-name and namespace queries. Never a stored name. */
export const WILDCARD = '*';

// ---------------------------------------------------------------------------
// Lexical checks
// ---------------------------------------------------------------------------

function splitQualifiedName(qualifiedName: string): [string | null, string] {
	if (!isXmlName(qualifiedName)) {
		throw new DomError('InvalidCharacter', `'${qualifiedName}' is not a valid XML name`);
	}
	const parts = qualifiedName.split(':');
	if (parts.length === 1) return [null, qualifiedName];
	if (parts.length === 2 && isNCName(parts[0]) && isNCName(parts[1])) return [parts[0], parts[1]];
	throw new DomError('Namespace', `'${qualifiedName}' is not a valid qualified name`);
}

function isXmlnsName(prefix: string | null, localName: string): boolean {
	return prefix === XMLNS_PREFIX || (prefix === null && localName === XMLNS_PREFIX);
}

/** The namespaces `xml:` and `xmlns` carry without being declared. */
function impliedNamespace(prefix: string | null, localName: string): string | null {
	if (prefix === XML_PREFIX) return XML_NS;
	if (isXmlnsName(prefix, localName)) return XMLNS_NS;
	return null;
}

// ---------------------------------------------------------------------------
// Name
// ---------------------------------------------------------------------------

export class Name {
	readonly localName: string;
	readonly prefix: string | null;
	readonly namespaceURI: string | null;

	private constructor(localName: string, prefix: string | null, namespaceURI: string | null) {
		this.localName = localName;
		this.prefix = prefix;
		this.namespaceURI = namespaceURI;
	}

	/**
	 * Parse a qualified name with no explicit namespace.
	 *
	 * Throws `InvalidCharacter` when the string is not an XML Name and
	 * `Namespace` when it is a Name but not a well-formed QName.
	 */
	static parse(qualifiedName: string): Name {
		const [prefix, localName] = splitQualifiedName(qualifiedName);
		return new Name(localName, prefix, impliedNamespace(prefix, localName));
	}

	/**
	 * Build a name in `namespaceURI`; an empty URI counts as no namespace.
	 * Besides the lexical checks of {@link Name.parse}, the prefix has to be
	 * consistent with the URI (`Namespace` otherwise).
	 */
	static fromNamespace(namespaceURI: string | null, qualifiedName: string): Name {
		const [prefix, localName] = splitQualifiedName(qualifiedName);
		const uri = namespaceURI === null || namespaceURI.length === 0 ? null : namespaceURI;
		if (prefix !== null && uri === null) {
			throw new DomError('Namespace', `prefix '${prefix}' used without a namespace URI`);
		}
		if (prefix === XML_PREFIX && uri !== XML_NS) {
			throw new DomError('Namespace', `prefix '${XML_PREFIX}' is bound to ${XML_NS}`);
		}
		if (isXmlnsName(prefix, localName) !== (uri === XMLNS_NS)) {
			throw new DomError('Namespace', `'${qualifiedName}' and ${XMLNS_NS} must be used together`);
		}
		return new Name(localName, prefix, uri);
	}

	/** `#text`, `#comment` and the other names of unnamed node kinds. */
	static special(name: SpecialNodeName): Name {
		return new Name(name, null, null);
	}

	/** `xmlns` itself, or any `xmlns:*` name. */
	isNamespaceDeclaration(): boolean {
		return isXmlnsName(this.prefix, this.localName);
	}

	equals(other: Name): boolean {
		return this.prefix === other.prefix && this.localName === other.localName;
	}

	/** Map key; names that are `equals` share a key. */
	get key(): string {
		return this.toString();
	}

	toString(): string {
		return this.prefix !== null ? `${this.prefix}:${this.localName}` : this.localName;
	}
}

// ---------------------------------------------------------------------------
// Query matching
// ---------------------------------------------------------------------------

function wildEquals(a: string, b: string): boolean {
	return a === b || a === WILDCARD || b === WILDCARD;
}

/** Tag-name test: equal qualified names, or `*` on either side. */
export function tagNameMatches(candidate: string, tagName: string): boolean {
	return wildEquals(candidate, tagName);
}

/**
 * Namespace-aware test of `candidate` against a query.
 *
 * A candidate outside any namespace only matches the `*` namespace; one
 * inside a namespace matches that URI literally or through `*`. Local names
 * compare the same way as {@link tagNameMatches}.
 */
export function namespacedNameMatches(candidate: Name, namespaceURI: string, localName: string): boolean {
	if (!wildEquals(candidate.localName, localName)) return false;
	if (candidate.namespaceURI === null) return namespaceURI === WILDCARD;
	return wildEquals(candidate.namespaceURI, namespaceURI);
}
