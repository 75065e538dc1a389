/**
 * Minimal HTTP client built on native fetch.
 *
 * Covers only what a signature upload needs:
 *   - HttpClient.create({ timeout, auth })
 *   - instance.put(url, body, config?) → { status, headers }
 *   - isHttpClientError(err) type guard
 */

export interface BasicAuth {
    username: string;
    password: string;
}

export interface HttpClientConfig {
    timeout?: number;
    auth?: BasicAuth;
}

export interface RequestConfig {
    headers?: Record<string, string>;
}

export type RequestBody = string | Uint8Array;

export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
}

export class HttpClientError extends Error {
    public response?: {
        data: unknown;
        status: number;
        statusText: string;
        headers: Record<string, string>;
    };
    public code?: string;

    constructor(message: string, options?: {
        response?: HttpClientError['response'];
        code?: string;
        cause?: unknown;
    }) {
        super(message, options?.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'HttpClientError';
        this.response = options?.response;
        this.code = options?.code;
    }
}

export function isHttpClientError(error: unknown): error is HttpClientError {
    return error instanceof HttpClientError;
}

export function basicAuthHeader(auth: BasicAuth): string {
    return 'Basic ' + Buffer.from(`${auth.username}:${auth.password}`, 'utf8').toString('base64');
}

function systemErrorCode(err: unknown): string | undefined {
    if (!(err instanceof Error)) return undefined;
    const cause = err.cause;
    if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
        return cause.code;  // Node.js fetch includes cause with system error code
    }
    return undefined;
}

function collectHeaders(res: Response): Record<string, string> {
    const headers: Record<string, string> = {};
    res.headers.forEach((value, key) => {
        headers[key] = value;
    });
    return headers;
}

export class HttpClient {
    private timeout: number;
    private authHeaders: Record<string, string>;

    private constructor(config: HttpClientConfig) {
        this.timeout = config.timeout ?? 30000;
        this.authHeaders = config.auth ? { Authorization: basicAuthHeader(config.auth) } : {};
    }

    static create(config: HttpClientConfig = {}): HttpClient {
        return new HttpClient(config);
    }

    /**
     * PUT a body to an absolute URL. Non-2xx, network failures and
     * timeouts reject with HttpClientError.
     */
    async put(url: string, body: RequestBody, config?: RequestConfig): Promise<HttpResponse> {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeout);

        try {
            const res = await fetch(url, {
                method: 'PUT',
                headers: {
                    ...this.authHeaders,
                    ...(config?.headers || {}),
                },
                body,
                signal: controller.signal,
            });
            const headers = collectHeaders(res);

            if (!res.ok) {
                // Keep the server's explanation for --debug output
                const text = await res.text();
                let data: unknown = null;
                if (text) {
                    try { data = JSON.parse(text); } catch { data = text; }
                }
                throw new HttpClientError(
                    `Request failed with status ${res.status}`,
                    {
                        response: {
                            data,
                            status: res.status,
                            statusText: res.statusText,
                            headers,
                        },
                    }
                );
            }

            // Drain the body so the connection is released
            await res.arrayBuffer();
            return { status: res.status, headers };
        } catch (err) {
            // Already an HttpClientError (from !res.ok above) — rethrow
            if (err instanceof HttpClientError) throw err;

            // Map network/timeout errors
            if (err instanceof Error && err.name === 'AbortError') {
                throw new HttpClientError('Request timed out', { code: 'ECONNABORTED', cause: err });
            }
            const code = systemErrorCode(err);
            const message = err instanceof Error && err.message ? err.message : 'Network error';
            throw new HttpClientError(code ? `${message} (${code})` : message, { code, cause: err });
        } finally {
            clearTimeout(timer);
        }
    }
}
