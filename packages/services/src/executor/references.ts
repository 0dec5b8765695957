import type { ObjectRef, ObjectType } from "@guildhand/actions";

function keyFor(type: ObjectType, name: string): string {
	return `${type}:${name.trim().toLowerCase()}`;
}

/**
 * Objects created earlier in the current batch, looked up by kind and name
 * (case-insensitive).
 */
export class CreatedObjects {
	private readonly byName = new Map<string, ObjectRef>();

	/** Records `ref` under its platform name and under any requested aliases. */
	record(ref: ObjectRef, ...aliases: string[]): void {
		for (const name of [ref.name, ...aliases]) {
			this.byName.set(keyFor(ref.type, name), ref);
		}
	}

	/**
	 * The id of an object created earlier in the batch, or `reference` unchanged.
	 */
	resolve(reference: string, types: ObjectType[]): string {
		for (const type of types) {
			const ref = this.byName.get(keyFor(type, reference));
			if (ref) return ref.id;
		}
		return reference;
	}
}
