/**
 * arbor-dom — Checked down-casts
 *
 * Each `as*` helper returns the node typed as the requested capability, or
 * logs a warning and returns `null` when the node is of another kind. Use
 * the plain type guards in types.ts where a mismatch is expected.
 */

import { MSG_INVALID_NODE_TYPE } from './errors.ts';
import { getLogger } from './logger.ts';
import {
	isAttribute,
	isCharacterData,
	isComment,
	isDocument,
	isDocumentFragment,
	isDocumentType,
	isElement,
	isEntity,
	isEntityReference,
	isNotation,
	isProcessingInstruction,
	isText,
	isCDataSection,
} from './types.ts';
import type {
	Attribute,
	CDataSection,
	CharacterData,
	Comment,
	Document,
	DocumentFragment,
	DocumentType,
	Element,
	Entity,
	EntityReference,
	Node,
	Notation,
	ProcessingInstruction,
	Text,
} from './types.ts';

function cast<T extends Node>(node: Node, guard: (n: Node) => n is T, capability: string): T | null {
	if (guard(node)) return node;
	getLogger().warn(MSG_INVALID_NODE_TYPE, `cannot use a ${node.nodeType} as ${capability}`);
	return null;
}

export const asDocument = (node: Node): Document | null => cast(node, isDocument, 'Document');
export const asDocumentFragment = (node: Node): DocumentFragment | null => cast(node, isDocumentFragment, 'DocumentFragment');
export const asDocumentType = (node: Node): DocumentType | null => cast(node, isDocumentType, 'DocumentType');
export const asElement = (node: Node): Element | null => cast(node, isElement, 'Element');
export const asAttribute = (node: Node): Attribute | null => cast(node, isAttribute, 'Attribute');
export const asCharacterData = (node: Node): CharacterData | null => cast(node, isCharacterData, 'CharacterData');
export const asText = (node: Node): Text | null => cast(node, isText, 'Text');
export const asCDataSection = (node: Node): CDataSection | null => cast(node, isCDataSection, 'CDataSection');
export const asComment = (node: Node): Comment | null => cast(node, isComment, 'Comment');
export const asProcessingInstruction = (node: Node): ProcessingInstruction | null => cast(node, isProcessingInstruction, 'ProcessingInstruction');
export const asEntity = (node: Node): Entity | null => cast(node, isEntity, 'Entity');
export const asEntityReference = (node: Node): EntityReference | null => cast(node, isEntityReference, 'EntityReference');
export const asNotation = (node: Node): Notation | null => cast(node, isNotation, 'Notation');
