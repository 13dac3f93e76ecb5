/**
 * arbor-dom — Node references
 *
 * Downward edges (parent → child, document → document element,
 * element → attribute) are plain object references and keep their target
 * alive. Upward edges (child → parent, node → owner document,
 * attribute → owner element) are `WeakNodeRef`s: they never keep the target
 * alive and must be upgraded before use.
 */

export class WeakNodeRef<T extends object> {
	private readonly target: WeakRef<T>;

	constructor(target: T) {
		this.target = new WeakRef(target);
	}

	/** The referent, or `null` once it has been collected. */
	upgrade(): T | null {
		return this.target.deref() ?? null;
	}

	refersTo(node: T): boolean {
		return this.target.deref() === node;
	}
}

export function downgrade<T extends object>(node: T): WeakNodeRef<T> {
	return new WeakNodeRef(node);
}
