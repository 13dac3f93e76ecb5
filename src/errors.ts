/**
 * arbor-dom — Error type and warning messages
 *
 * Two tiers:
 * • Hard failures throw a `DomError` whose `kind` names the DOM exception
 *   class. Validation runs before any mutation, so a throw leaves the tree
 *   as it was.
 * • Soft failures (asking a node for a capability it does not have) are
 *   logged with one of the `MSG_*` texts below and answered with a neutral
 *   value (`null`, `false`, `0`, `[]`).
 */

export type DomErrorKind = 'IndexSize' | 'Syntax' | 'InvalidState' | 'HierarchyRequest' | 'WrongDocument' | 'Namespace' | 'InvalidCharacter' | 'NotFound';

export class DomError extends Error {
	readonly kind: DomErrorKind;

	constructor(kind: DomErrorKind, message: string) {
		super(message);
		this.name = 'DomError';
		this.kind = kind;
	}
}

export function isDomError(e: unknown): e is DomError {
	return e instanceof DomError;
}

// ---------------------------------------------------------------------------
// Log messages
// ---------------------------------------------------------------------------

export const MSG_INVALID_NODE_TYPE = 'operation not supported by this node type';
export const MSG_INVALID_EXTENSION = 'node does not carry the state this operation reads';
export const MSG_INVALID_NAME = 'invalid name';
export const MSG_NO_PARENT_NODE = 'node has no parent';
export const MSG_REPARENT = 'moving node out of its previous parent';
