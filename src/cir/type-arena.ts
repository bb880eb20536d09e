// Sever CIR Type Arena
// Boxed element types (pointees, array elements) created during type lowering.
// Nodes live as long as the lowering session and are released together.

import type { CirType } from "./types.js";

/** Index of a node in a TypeArena. */
export type TypeHandle = number;

export class TypeArena {
	private nodes: CirType[] = [];
	private released = false;

	alloc(type: CirType): TypeHandle {
		if (this.released) {
			throw new Error("TypeArena used after release");
		}
		this.nodes.push(type);
		return this.nodes.length - 1;
	}

	get(handle: TypeHandle): CirType {
		const node = this.released ? undefined : this.nodes[handle];
		if (node === undefined) {
			throw new Error("Invalid type handle: " + String(handle));
		}
		return node;
	}

	/**
	 * Allocate a node and return it, for embedding in a parent type.
	 */
	box(type: CirType): CirType {
		return this.get(this.alloc(type));
	}

	get size(): number {
		return this.nodes.length;
	}

	get isReleased(): boolean {
		return this.released;
	}

	release(): void {
		this.nodes = [];
		this.released = true;
	}
}
