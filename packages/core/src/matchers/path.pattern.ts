/**
 * Path Patterns
 *
 * Glob syntax: `*` matches within one segment, `**` matches across
 * segments, `?` matches one non-slash character.
 */

import { ensure } from "../errors";

export type PathPattern =
	| { readonly kind: "exact"; readonly path: string }
	| { readonly kind: "glob"; readonly pattern: string; readonly regex: RegExp }
	| { readonly kind: "predicate"; readonly predicate: (path: string) => boolean; readonly description: string };

export type PathInput = string | PathPattern;

/**
 * Compile a glob pattern to an anchored regex
 */
export function compileGlob(pattern: string): RegExp {
	let source = "";
	for (let i = 0; i < pattern.length; i++) {
		const char = pattern.charAt(i);
		if (char === "*") {
			if (pattern.charAt(i + 1) === "*") {
				source += ".*";
				i++;
			} else {
				source += "[^/]*";
			}
		} else if (char === "?") {
			source += "[^/]";
		} else {
			source += char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
		}
	}
	return new RegExp(`^${source}$`);
}

export function exactPath(path: string): PathPattern {
	ensure(path.startsWith("/"), "path", `"${path}" must start with "/"`);
	return { kind: "exact", path };
}

export function globPath(pattern: string): PathPattern {
	ensure(pattern.startsWith("/") || pattern.startsWith("*"), "path", `glob "${pattern}" must start with "/" or "*"`);
	return { kind: "glob", pattern, regex: compileGlob(pattern) };
}

export function pathWhere(predicate: (path: string) => boolean, description = "path satisfies predicate"): PathPattern {
	return { kind: "predicate", predicate, description };
}

/**
 * Strings containing glob characters become glob patterns, others exact paths
 */
export function toPathPattern(input: PathInput): PathPattern {
	if (typeof input !== "string") {
		return input;
	}
	return /[*?]/.test(input) ? globPath(input) : exactPath(input);
}

export function matchPath(pattern: PathPattern, path: string): boolean {
	switch (pattern.kind) {
		case "exact":
			return pattern.path === path;
		case "glob":
			return pattern.regex.test(path);
		case "predicate":
			return pattern.predicate(path);
	}
}

export function describePath(pattern: PathPattern): string {
	switch (pattern.kind) {
		case "exact":
			return `path equals "${pattern.path}"`;
		case "glob":
			return `path matches "${pattern.pattern}"`;
		case "predicate":
			return pattern.description;
	}
}

/**
 * Short label for descriptions: the path, the glob, or the predicate description
 */
export function pathLabel(pattern: PathPattern): string {
	switch (pattern.kind) {
		case "exact":
			return pattern.path;
		case "glob":
			return pattern.pattern;
		case "predicate":
			return pattern.description;
	}
}
