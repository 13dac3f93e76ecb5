/**
 * Test helpers — document construction, a logger that records instead of
 * printing, and a `DomError` assertion.
 */
import assert from 'node:assert/strict';
import { DOMImplementation, setLogger } from '../src/index.ts';
import type { Document, DomErrorKind, Element, Logger } from '../src/index.ts';

export class RecordingLogger implements Logger {
	readonly warnings: string[] = [];
	readonly debugs: string[] = [];

	debug(message: string): void {
		this.debugs.push(message);
	}

	warn(message: string): void {
		this.warnings.push(message);
	}
}

/** Runs `fn` with a fresh `RecordingLogger` installed, then restores the previous logger. */
export function withLogger<T>(fn: (logger: RecordingLogger) => T): T {
	const logger = new RecordingLogger();
	const previous = setLogger(logger);
	try {
		return fn(logger);
	} finally {
		setLogger(previous);
	}
}

export function newDocument(namespaceURI = 'http://example.org/', qualifiedName = 'root'): Document {
	return new DOMImplementation().createDocument(namespaceURI, qualifiedName);
}

/** Returns the document element, throwing if absent. */
export function rootElement(doc: Document): Element {
	const el = doc.documentElement;
	if (el === null) throw new Error('Document has no document element');
	return el;
}

/** Appends a new element named `name` to `parent` and returns it. */
export function appendElement(doc: Document, parent: Element, name: string): Element {
	const el = doc.createElement(name);
	parent.appendChild(el);
	return el;
}

export function assertDomError(fn: () => unknown, kind: DomErrorKind): void {
	assert.throws(fn, { name: 'DomError', kind });
}

/** `nodeName` of each node, for compact order assertions. */
export function names(nodes: Iterable<{ nodeName: string }>): string[] {
	return [...nodes].map((n) => n.nodeName);
}
