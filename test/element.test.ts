import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MSG_INVALID_EXTENSION, MSG_INVALID_NAME, MSG_INVALID_NODE_TYPE, NodeImpl, XML_NS } from '../src/index.ts';
import { appendElement, assertDomError, names, newDocument, rootElement, withLogger } from './helpers.ts';

describe('Element — attributes by name', () => {
	it('sets, reads and overwrites', () => {
		const doc = newDocument();
		const el = rootElement(doc);
		el.setAttribute('a', '1');
		const first = el.getAttributeNode('a');
		el.setAttribute('a', '2');
		assert.equal(el.getAttribute('a'), '2');
		assert.equal(el.attributes.size, 1);
		assert.equal(first?.ownerElement, null);
		assert.equal(el.getAttributeNode('a')?.ownerElement, el);
	});

	it('answers null and false for absent attributes', () => {
		const el = rootElement(newDocument());
		assert.equal(el.getAttribute('missing'), null);
		assert.equal(el.hasAttribute('missing'), false);
		assert.equal(el.hasAttributes(), false);
	});

	it('keeps attributes in insertion order', () => {
		const el = rootElement(newDocument());
		el.setAttribute('z', '1');
		el.setAttribute('a', '2');
		el.setAttribute('m', '3');
		assert.deepEqual([...el.attributes.keys()], ['z', 'a', 'm']);
	});

	it('warns instead of throwing when a lookup name is invalid', () => {
		const el = rootElement(newDocument());
		withLogger((logger) => {
			assert.equal(el.getAttribute('bad name'), null);
			assert.deepEqual(logger.warnings, [MSG_INVALID_NAME]);
		});
	});

	it('throws when a new attribute name is invalid', () => {
		const el = rootElement(newDocument());
		assertDomError(() => el.setAttribute('bad name', 'v'), 'InvalidCharacter');
	});

	it('removes by name, ignoring absent names', () => {
		const el = rootElement(newDocument());
		el.setAttribute('a', '1');
		const node = el.getAttributeNode('a');
		el.removeAttribute('a');
		el.removeAttribute('missing');
		assert.equal(el.hasAttribute('a'), false);
		assert.equal(node?.ownerElement, null);
	});
});

describe('Element — attribute nodes', () => {
	it('attaches a created attribute', () => {
		const doc = newDocument();
		const el = rootElement(doc);
		const attr = doc.createAttributeWith('a', 'v');
		assert.equal(el.setAttributeNode(attr), attr);
		assert.equal(attr.ownerElement, el);
		assert.equal(el.getAttribute('a'), 'v');
	});

	it('refuses an attribute in use elsewhere', () => {
		const doc = newDocument();
		const el = rootElement(doc);
		const other = appendElement(doc, el, 'other');
		const attr = doc.createAttributeWith('a', 'v');
		other.setAttributeNode(attr);
		assertDomError(() => el.setAttributeNode(attr), 'InvalidState');
		assert.equal(el.hasAttribute('a'), false);
	});

	it('refuses an attribute from another document', () => {
		const el = rootElement(newDocument());
		const foreign = newDocument().createAttribute('a');
		assertDomError(() => el.setAttributeNode(foreign), 'WrongDocument');
	});

	it('refuses a node that is not an attribute', () => {
		const doc = newDocument();
		const el = NodeImpl.from(rootElement(doc));
		withLogger((logger) => {
			assertDomError(() => el.setAttributeNode(doc.createTextNode('t')), 'InvalidState');
			assert.deepEqual(logger.warnings, [MSG_INVALID_NODE_TYPE]);
		});
	});

	it('removes an attribute node once', () => {
		const doc = newDocument();
		const el = rootElement(doc);
		const attr = el.setAttributeNode(doc.createAttributeWith('a', 'v'));
		assert.equal(el.removeAttributeNode(attr), attr);
		assert.equal(attr.ownerElement, null);
		assertDomError(() => el.removeAttributeNode(attr), 'NotFound');
	});
});

describe('Element — namespaces', () => {
	it('binds the prefix an xmlns:p attribute declares', () => {
		const doc = newDocument();
		const el = rootElement(doc);
		const child = appendElement(doc, el, 'child');
		el.setAttributeNode(doc.createAttributeWith('xmlns:p', 'urn:p'));
		assert.equal(el.lookupNamespaceURI('p'), 'urn:p');
		assert.equal(child.lookupNamespaceURI('p'), 'urn:p');
		assert.equal(child.lookupPrefix('urn:p'), 'p');
		assert.equal(el.lookupNamespaceURI('q'), null);
	});

	it('binds the default namespace from xmlns', () => {
		const el = rootElement(newDocument());
		el.setAttribute('xmlns', 'urn:d');
		assert.equal(el.lookupNamespaceURI(null), 'urn:d');
		assert.equal(el.lookupPrefix('urn:d'), null);
	});

	it('resolves from an attribute through its owner element', () => {
		const doc = newDocument();
		const el = rootElement(doc);
		el.setAttribute('xmlns:p', 'urn:p');
		el.setAttribute('p:color', 'red');
		const attr = NodeImpl.from(el).getAttributeNode('p:color');
		assert.equal(attr?.lookupNamespaceURI('p'), 'urn:p');
		assert.equal(NodeImpl.from(doc.createAttribute('loose')).lookupNamespaceURI('p'), null);
	});

	it('knows the xml prefix without a declaration', () => {
		const el = rootElement(newDocument());
		assert.equal(el.lookupNamespaceURI('xml'), XML_NS);
		assert.equal(el.lookupPrefix(XML_NS), 'xml');
	});

	it('rejects forbidden bindings', () => {
		const el = rootElement(newDocument());
		assertDomError(() => el.setAttribute('xmlns:p', ''), 'Namespace');
		assertDomError(() => el.setAttribute('xmlns:q', XML_NS), 'Namespace');
		assertDomError(() => el.setAttribute('xmlns:xml', 'urn:other'), 'Namespace');
		assertDomError(() => el.setAttribute('xmlns:p', 'http://www.w3.org/2000/xmlns/'), 'Namespace');
		assert.equal(el.hasAttributes(), false);
	});

	it('forgets a binding when its declaration is removed', () => {
		const el = rootElement(newDocument());
		el.setAttribute('xmlns:p', 'urn:p');
		el.removeAttribute('xmlns:p');
		assert.equal(el.lookupNamespaceURI('p'), null);
	});

	it('rebinds a prefix when its declaration value changes', () => {
		const el = rootElement(newDocument());
		el.setAttribute('xmlns:p', 'urn:p');
		const attr = el.getAttributeNode('xmlns:p');
		assert.ok(attr);
		attr.value = 'urn:q';
		assert.equal(el.lookupNamespaceURI('p'), 'urn:q');
		assert.equal(el.lookupPrefix('urn:p'), null);
		el.removeAttribute('xmlns:p');
		assert.equal(el.lookupNamespaceURI('p'), null);
	});

	it('validates a declaration value changed in place', () => {
		const el = rootElement(newDocument());
		el.setAttribute('xmlns:p', 'urn:p');
		const attr = el.getAttributeNode('xmlns:p');
		assert.ok(attr);
		assertDomError(() => {
			attr.value = '';
		}, 'Namespace');
		assert.equal(attr.value, 'urn:p');
		assert.equal(el.lookupNamespaceURI('p'), 'urn:p');
	});

	it('finds prefixed attributes through declared prefixes', () => {
		const el = rootElement(newDocument());
		el.setAttribute('xmlns:p', 'urn:p');
		el.setAttribute('p:color', 'red');
		assert.equal(el.getAttributeNS('urn:p', 'color'), 'red');
		assert.equal(el.hasAttributeNS('urn:other', 'color'), false);
	});

	it('sets, replaces and removes namespaced attributes', () => {
		const el = rootElement(newDocument());
		el.setAttributeNS('urn:x', 'x:size', '10');
		assert.equal(el.getAttributeNS('urn:x', 'size'), '10');
		assert.equal(el.getAttribute('x:size'), '10');

		el.setAttributeNS('urn:x', 'y:size', '20');
		assert.equal(el.getAttributeNS('urn:x', 'size'), '20');
		assert.equal(el.hasAttribute('x:size'), false);
		assert.deepEqual([...el.attributes.keys()], ['y:size']);

		el.removeAttributeNS('urn:x', 'size');
		assert.equal(el.hasAttributeNS('urn:x', 'size'), false);
	});

	it('matches unprefixed attributes under no namespace', () => {
		const el = rootElement(newDocument());
		el.setAttribute('plain', 'v');
		assert.equal(el.getAttributeNS(null, 'plain'), 'v');
		assert.equal(el.getAttributeNS('', 'plain'), 'v');
	});
});

describe('Element — getElementsByTagName', () => {
	function sample() {
		const doc = newDocument();
		const root = rootElement(doc);
		const a = appendElement(doc, root, 'a');
		appendElement(doc, a, 'b');
		appendElement(doc, root, 'b');
		root.appendChild(doc.createTextNode('text'));
		const c = appendElement(doc, root, 'c');
		appendElement(doc, c, 'b');
		return { doc, root };
	}

	it('collects matches in document order', () => {
		const { root } = sample();
		const found = root.getElementsByTagName('b');
		assert.equal(found.length, 3);
		assert.deepEqual(found.map((el) => el.parentNode?.nodeName), ['a', 'root', 'c']);
	});

	it('includes the starting element under the wildcard', () => {
		const { doc, root } = sample();
		assert.deepEqual(names(root.getElementsByTagName('*')), ['root', 'a', 'b', 'b', 'c', 'b']);
		assert.deepEqual(names(doc.getElementsByTagName('*')), ['root', 'a', 'b', 'b', 'c', 'b']);
	});

	it('finds nothing in a document without a document element', () => {
		const { doc, root } = sample();
		doc.removeChild(root);
		assert.deepEqual(doc.getElementsByTagName('*'), []);
	});

	it('matches by namespace and local name', () => {
		const doc = newDocument('urn:x', 'root');
		const root = rootElement(doc);
		root.appendChild(doc.createElementNS('urn:x', 'x:item'));
		root.appendChild(doc.createElementNS('urn:y', 'y:item'));
		root.appendChild(doc.createElement('item'));

		assert.deepEqual(names(root.getElementsByTagNameNS('urn:x', 'item')), ['x:item']);
		assert.deepEqual(names(root.getElementsByTagNameNS('*', 'item')), ['x:item', 'y:item', 'item']);
		assert.deepEqual(names(doc.getElementsByTagNameNS('urn:x', '*')), ['root', 'x:item']);
	});

	it('warns when searched from a text node', () => {
		const text = NodeImpl.from(newDocument().createTextNode('t'));
		withLogger((logger) => {
			assert.deepEqual(text.getElementsByTagName('*'), []);
			assert.deepEqual(logger.warnings, [MSG_INVALID_NODE_TYPE]);
		});
	});
});

describe('Element — accessors on other kinds', () => {
	it('gives a text node no attributes', () => {
		const text = newDocument().createTextNode('t');
		withLogger((logger) => {
			assert.equal(text.attributes.size, 0);
			assert.equal(text.hasAttributes(), false);
			assert.deepEqual(logger.warnings, [MSG_INVALID_EXTENSION]);
		});
	});

	it('reads attributes of a comment as absent', () => {
		const comment = NodeImpl.from(newDocument().createComment('c'));
		withLogger((logger) => {
			assert.equal(comment.getAttribute('a'), null);
			assert.equal(comment.hasAttribute('a'), false);
			assert.deepEqual(logger.warnings, [MSG_INVALID_NODE_TYPE, MSG_INVALID_NODE_TYPE]);
		});
	});
});
