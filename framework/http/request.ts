/**
 * Enhanced Request Object
 *
 * Wraps the native Request with cookie parsing and cached body access, so
 * middleware and the view can both read the submitted form.
 */

export interface RequestOptions {
  params?: Record<string, string>;
  clientAddress?: string;
}

export type FormFields = Record<string, string>;

/**
 * Enhanced Request class
 */
export class TrellisRequest {
  private _request: Request;
  private _url: URL;
  private _params: Record<string, string>;
  private _clientAddress: string | null;
  private _cookies: Map<string, string> | null = null;
  private _body: Promise<ArrayBuffer> | null = null;
  private _form: Promise<FormFields> | null = null;

  constructor(request: Request, options: RequestOptions = {}) {
    this._request = request;
    this._url = new URL(request.url);
    this._params = options.params ?? {};
    this._clientAddress = options.clientAddress ?? null;
  }

  /**
   * The underlying native Request
   */
  get raw(): Request {
    return this._request;
  }

  get method(): string {
    return this._request.method.toUpperCase();
  }

  get url(): URL {
    return this._url;
  }

  /**
   * URL path (without query string)
   */
  get path(): string {
    return this._url.pathname;
  }

  get query(): URLSearchParams {
    return this._url.searchParams;
  }

  /**
   * Route parameters extracted from path
   */
  get params(): Record<string, string> {
    return this._params;
  }

  get headers(): Headers {
    return this._request.headers;
  }

  header(name: string): string | null {
    return this._request.headers.get(name);
  }

  get contentType(): string | null {
    return this.header('Content-Type');
  }

  /**
   * Host the request was addressed to
   */
  get host(): string {
    return this.header('Host') ?? this._url.host;
  }

  /**
   * Client IP address (accounting for proxies)
   */
  get ip(): string {
    return (
      this.header('X-Forwarded-For')?.split(',')[0]?.trim() ||
      this.header('X-Real-IP') ||
      this._clientAddress ||
      'unknown'
    );
  }

  get cookies(): Map<string, string> {
    if (!this._cookies) {
      this._cookies = parseCookieHeader(this.header('Cookie'));
    }
    return this._cookies;
  }

  cookie(name: string): string | undefined {
    return this.cookies.get(name);
  }

  /**
   * Raw body bytes, read once
   */
  arrayBuffer(): Promise<ArrayBuffer> {
    if (!this._body) {
      this._body = this._request.arrayBuffer();
    }
    return this._body;
  }

  async text(): Promise<string> {
    return new TextDecoder().decode(await this.arrayBuffer());
  }

  async json(): Promise<unknown> {
    const text = await this.text();
    return text ? JSON.parse(text) : null;
  }

  /**
   * Submitted form fields (urlencoded or multipart); file parts are skipped
   */
  form(): Promise<FormFields> {
    if (!this._form) {
      this._form = this.parseForm();
    }
    return this._form;
  }

  /**
   * A single submitted field, read from the form or a JSON object body
   */
  async field(name: string): Promise<string | null> {
    if (this.isJson) {
      try {
        const body = await this.json();
        if (typeof body === 'object' && body !== null && !Array.isArray(body)) {
          const value: unknown = Object.getOwnPropertyDescriptor(body, name)?.value;
          return typeof value === 'string' ? value : null;
        }
      } catch {
        return null;
      }
      return null;
    }

    const form = await this.form();
    return Object.hasOwn(form, name) ? form[name] : null;
  }

  get isJson(): boolean {
    return (this.contentType ?? '').toLowerCase().includes('application/json');
  }

  /**
   * Set route parameters (used by the application after matching)
   */
  setParams(params: Record<string, string>): void {
    this._params = params;
  }

  private async parseForm(): Promise<FormFields> {
    const contentType = this.contentType ?? '';
    const type = contentType.toLowerCase();
    const fields: FormFields = {};

    if (type.includes('application/x-www-form-urlencoded')) {
      for (const [key, value] of new URLSearchParams(await this.text())) {
        fields[key] = value;
      }
      return fields;
    }

    if (type.includes('multipart/form-data')) {
      const data = await new Response(await this.arrayBuffer(), {
        headers: { 'Content-Type': contentType },
      }).formData();
      for (const [key, value] of data) {
        if (typeof value === 'string') {
          fields[key] = value;
        }
      }
    }

    return fields;
  }
}

/**
 * Parse a Cookie header into a name → value map
 */
export function parseCookieHeader(header: string | null): Map<string, string> {
  const cookies = new Map<string, string>();
  if (!header) return cookies;

  for (const part of header.split(';')) {
    const index = part.indexOf('=');
    if (index === -1) continue;
    const name = part.slice(0, index).trim();
    const value = part.slice(index + 1).trim();
    if (!name || cookies.has(name)) continue;
    cookies.set(name, safeDecode(value));
  }

  return cookies;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
