// SPDX-License-Identifier: MIT
// Compilation-local object arena
//
// Aliases of surface objects, decomposition temporaries and constructed
// braidings all live here under small integer handles. One arena belongs to
// one compilation, so plans carry every name they use.

import type { LocalEntry, LocalObject, LocalRole } from "./types.js";

const rolePrefix: Record<LocalRole, string> = {
	alias: "",
	temporary: "tmp",
	braiding: "τ",
};

export class LocalArena {
	private readonly entries: LocalEntry[] = [];
	private readonly aliases = new Map<string, number>();

	/** Allocate a fresh handle */
	allocate(role: LocalRole, name?: string): LocalObject {
		const handle = this.entries.length;
		this.entries.push({
			handle,
			role,
			name: name ?? rolePrefix[role] + String(this.countOf(role) + 1),
		});
		return { kind: "local", handle };
	}

	/** Alias handle of a surface object, allocated on first request */
	alias(name: string): LocalObject {
		const existing = this.aliases.get(name);
		if (existing !== undefined) {
			return { kind: "local", handle: existing };
		}
		const ref = this.allocate("alias", name);
		this.aliases.set(name, ref.handle);
		return ref;
	}

	lookupAlias(name: string): number | undefined {
		return this.aliases.get(name);
	}

	entry(handle: number): LocalEntry | undefined {
		return this.entries[handle];
	}

	nameOf(handle: number): string {
		return this.entries[handle]?.name ?? "%" + String(handle);
	}

	countOf(role: LocalRole): number {
		return this.entries.filter((e) => e.role === role).length;
	}

	snapshot(): readonly LocalEntry[] {
		return this.entries.map((e) => ({ ...e }));
	}
}
