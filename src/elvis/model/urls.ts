import { CompilationError } from "../core/errors.js";

const SCHEME_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):\/\//;

export type SplitUrl = {
	scheme: string | null;
	/** Everything after `scheme://`, or the whole URL when it names no scheme. */
	rest: string;
};

export function splitScheme(url: string): SplitUrl {
	const match = SCHEME_PATTERN.exec(url);
	if (!match) return { scheme: null, rest: url };
	return { scheme: match[1] ?? null, rest: url.slice(match[0].length) };
}

export type ResolvedUrls = {
	baseUrl: string;
	searchUrl: string;
	baseUrlWithoutScheme: string;
};

/**
 * Give both URLs the same scheme: the one either of them names, or https
 * (http when insecure) if neither does.
 */
export function resolveUrls(
	baseUrl: string,
	searchUrl: string,
	insecure: boolean,
): ResolvedUrls {
	const base = splitScheme(baseUrl);
	const search = splitScheme(searchUrl);

	if (base.scheme && search.scheme && base.scheme !== search.scheme) {
		throw new CompilationError(
			"SchemeMismatch",
			`the schemes of both URLs must be the same ('${base.scheme}' and '${search.scheme}')`,
		);
	}

	const scheme = base.scheme ?? search.scheme ?? (insecure ? "http" : "https");
	return {
		baseUrl: `${scheme}://${base.rest}`,
		searchUrl: `${scheme}://${search.rest}`,
		baseUrlWithoutScheme: base.rest,
	};
}
