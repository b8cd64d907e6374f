export type QueryParamValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryParamValue>;

interface BuildUrlOptions {
    base: string;
    /** Path pieces; each may contain "/" and every part between slashes is percent-encoded */
    segments?: string[];
    queryParams?: QueryParams;
}

export function appendQueryParams(
    params: QueryParams,
    searchParams: URLSearchParams = new URLSearchParams()
): URLSearchParams {
    for (const [key, value] of Object.entries(params)) {
        if (value === undefined) {
            continue;
        }
        searchParams.set(key, String(value));
    }
    return searchParams;
}

export function buildUrl({ base, segments = [], queryParams }: BuildUrlOptions): string {
    const [basePath, existingQuery] = base.split("?");
    const path = segments
        .flatMap((segment) => segment.split("/"))
        .filter(Boolean)
        .map((part) => encodeURIComponent(part))
        .join("/");

    const joined = path ? `${basePath.replace(/\/+$/, "")}/${path}` : basePath;

    const searchParams = new URLSearchParams(existingQuery ?? "");
    if (queryParams) {
        appendQueryParams(queryParams, searchParams);
    }

    const queryString = searchParams.toString();
    return queryString ? `${joined}?${queryString}` : joined;
}
