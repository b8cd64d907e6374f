import type { z } from "zod";
import { ApiError, NetworkError } from "@app/clockify/errors";
import logger from "@app/logger";
import { formatDuration } from "@app/utils/format";
import { buildUrl, type QueryParams } from "@app/utils/url";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface ClockifyApiClientOptions {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
    /** Custom fetch implementation, for tests */
    fetchImpl?: FetchLike;
}

export interface RequestOptions {
    params?: QueryParams;
    body?: unknown;
}

/**
 * Thin authenticated wrapper around fetch. One call, one HTTP request: no retries.
 */
export class ClockifyApiClient {
    private apiKey: string;
    private baseUrl: string;
    private timeoutMs: number;
    private fetchImpl: FetchLike;

    constructor(options: ClockifyApiClientOptions) {
        this.apiKey = options.apiKey;
        this.baseUrl = options.baseUrl;
        this.timeoutMs = options.timeoutMs;
        this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    }

    // ============================================
    // HTTP Methods
    // ============================================

    /**
     * Make an authenticated request and return the parsed JSON body (undefined when empty)
     */
    async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
        const url = buildUrl({ base: this.baseUrl, segments: [path], queryParams: options.params });

        const headers: Record<string, string> = {
            "X-Api-Key": this.apiKey,
            Accept: "application/json",
        };
        if (options.body !== undefined) {
            headers["Content-Type"] = "application/json";
        }

        logger.debug(`[clockify-api] ${method} ${url}`);
        if (options.body !== undefined) {
            logger.trace({ body: options.body }, `[clockify-api] ${method} ${path} body`);
        }
        const startTime = Date.now();

        let response: Response;
        try {
            response = await this.fetchImpl(url, {
                method,
                headers,
                body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (error) {
            throw this.toNetworkError(method, path, error);
        }

        const elapsed = formatDuration(Date.now() - startTime);
        logger.debug(`[clockify-api] ${method} ${path} response: ${response.status} (${elapsed})`);

        let text: string;
        try {
            text = await response.text();
        } catch (error) {
            throw this.toNetworkError(method, path, error);
        }

        if (!response.ok) {
            logger.debug(`[clockify-api] Error body: ${text.slice(0, 200)}`);
            throw this.toApiError(method, path, response, text);
        }

        if (!text) {
            return undefined;
        }

        try {
            return JSON.parse(text);
        } catch {
            throw new ApiError(method, path, response.status, `Clockify returned invalid JSON for ${method} ${path}`);
        }
    }

    /**
     * Request and validate the body against a schema
     */
    async requestParsed<T>(
        method: HttpMethod,
        path: string,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        options: RequestOptions = {}
    ): Promise<T> {
        const data = await this.request(method, path, options);
        const parsed = schema.safeParse(data);

        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
            throw new ApiError(method, path, 200, `Unexpected response from ${method} ${path}${where}: ${issue.message}`);
        }

        return parsed.data;
    }

    async get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, params?: QueryParams): Promise<T> {
        return this.requestParsed("GET", path, schema, { params });
    }

    async post<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): Promise<T> {
        return this.requestParsed("POST", path, schema, { body });
    }

    async put<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): Promise<T> {
        return this.requestParsed("PUT", path, schema, { body });
    }

    async patch<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): Promise<T> {
        return this.requestParsed("PATCH", path, schema, { body });
    }

    async delete(path: string): Promise<void> {
        await this.request("DELETE", path);
    }

    // ============================================
    // Errors
    // ============================================

    private toApiError(method: HttpMethod, path: string, response: Response, text: string): ApiError {
        const detail = extractErrorMessage(text) || response.statusText || "no details";

        if (response.status === 401 || response.status === 403) {
            return new ApiError(
                method,
                path,
                response.status,
                `Authentication failed (${response.status}): check that CLOCKIFY_API_KEY holds a valid API key. Server said: ${detail}`
            );
        }

        return new ApiError(method, path, response.status, `Clockify API ${method} ${path} failed with ${response.status}: ${detail}`);
    }

    private toNetworkError(method: HttpMethod, path: string, error: unknown): NetworkError {
        if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
            return new NetworkError(`${method} ${path} timed out after ${this.timeoutMs}ms`);
        }

        const reason = describeCause(error);
        return new NetworkError(`Could not reach Clockify at ${this.baseUrl}: ${reason}`);
    }
}

/**
 * Clockify errors look like {"message": "...", "code": 501}
 */
function extractErrorMessage(text: string): string {
    if (!text) {
        return "";
    }

    try {
        const parsed: unknown = JSON.parse(text);
        if (typeof parsed === "object" && parsed !== null && "message" in parsed && typeof parsed.message === "string") {
            return parsed.message;
        }
        return text;
    } catch {
        return text.trim();
    }
}

/**
 * undici reports "fetch failed" and hides the useful part (ECONNREFUSED, ENOTFOUND) in `cause`
 */
function describeCause(error: unknown): string {
    if (!(error instanceof Error)) {
        return String(error);
    }

    const cause = error.cause;
    if (cause instanceof Error && cause.message) {
        return `${error.message} (${cause.message})`;
    }

    return error.message;
}
