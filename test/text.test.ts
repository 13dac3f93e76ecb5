import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MSG_INVALID_NODE_TYPE, NodeImpl, asText } from '../src/index.ts';
import { appendElement, assertDomError, names, newDocument, rootElement, withLogger } from './helpers.ts';

describe('Text — splitText', () => {
	it('moves the tail into the next sibling', () => {
		const doc = newDocument();
		const p = appendElement(doc, rootElement(doc), 'p');
		const text = doc.createTextNode('hello world');
		p.appendChild(text);
		const tail = appendElement(doc, p, 'tail');

		const rest = text.splitText(5);
		assert.equal(text.data, 'hello');
		assert.equal(rest.data, ' world');
		assert.equal(rest.parentNode, p);
		assert.equal(rest.ownerDocument, doc);
		assert.equal(text.nextSibling, rest);
		assert.equal(rest.nextSibling, tail);
		assert.deepEqual(names(p.childNodes), ['#text', '#text', 'tail']);
	});

	it('splits a detached node without inserting anything', () => {
		const doc = newDocument();
		const text = doc.createTextNode('hello world');
		const rest = text.splitText(6);
		assert.equal(text.data, 'hello ');
		assert.equal(rest.data, 'world');
		assert.equal(rest.parentNode, null);
	});

	it('produces an empty tail at or past the end', () => {
		const doc = newDocument();
		const text = doc.createTextNode('abc');
		assert.equal(text.splitText(3).data, '');
		assert.equal(text.splitText(10).data, '');
		assert.equal(text.data, 'abc');
	});

	it('keeps the CDATA kind', () => {
		const doc = newDocument();
		const cdata = doc.createCDATASection('a<b');
		const rest = cdata.splitText(1);
		assert.equal(rest.nodeType, 'cdata');
		assert.equal(rest.data, '<b');
		assert.equal(cdata.data, 'a');
	});

	it('is not available on comments', () => {
		const comment = NodeImpl.from(newDocument().createComment('note'));
		withLogger((logger) => {
			assertDomError(() => comment.splitText(1), 'Syntax');
			assert.deepEqual(logger.warnings, [MSG_INVALID_NODE_TYPE]);
		});
		assert.equal(comment.data, 'note');
	});

	it('rejects negative offsets', () => {
		const text = newDocument().createTextNode('abc');
		assertDomError(() => text.splitText(-1), 'IndexSize');
		assert.equal(text.data, 'abc');
	});

	it('rejects an offset that is not a number', () => {
		const text = newDocument().createTextNode('abc');
		assertDomError(() => text.splitText(Number.NaN), 'IndexSize');
		assert.equal(text.data, 'abc');
	});

	it('rejoins through normalize', () => {
		const doc = newDocument();
		const root = rootElement(doc);
		const text = doc.createTextNode('hello world');
		root.appendChild(text);
		text.splitText(5);
		assert.equal(root.childNodes.length, 2);
		root.normalize();
		assert.equal(root.childNodes.length, 1);
		assert.equal(root.firstChild, text);
		assert.equal(text.data, 'hello world');
	});
});

describe('Text — casting', () => {
	it('accepts text and CDATA', () => {
		const doc = newDocument();
		assert.equal(asText(doc.createCDATASection('x'))?.nodeType, 'cdata');
		assert.equal(asText(doc.createTextNode('x'))?.nodeType, 'text');
	});

	it('refuses a comment', () => {
		withLogger((logger) => {
			assert.equal(asText(newDocument().createComment('c')), null);
			assert.deepEqual(logger.warnings, [MSG_INVALID_NODE_TYPE]);
		});
	});
});
