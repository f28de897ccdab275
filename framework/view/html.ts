/**
 * HTML Utilities
 *
 * Escaping tagged template for views. Anything interpolated into html``
 * is escaped unless it is already SafeHtml.
 */

const ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Markup that has already been escaped or is trusted
 */
export class SafeHtml {
  constructor(public readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

/**
 * Escape a value for use in element content or a quoted attribute.
 * null and undefined render as nothing.
 */
export function escape(value: unknown): string {
  if (value instanceof SafeHtml) {
    return value.content;
  }
  return String(value ?? '').replace(/[&<>"']/g, (char) => ENTITIES[char] ?? char);
}

export function raw(content: string): SafeHtml {
  return new SafeHtml(content);
}

function interpolate(value: unknown): string {
  return Array.isArray(value) ? value.map(escape).join('') : escape(value);
}

/**
 * HTML tagged template literal. Arrays are escaped item by item and
 * concatenated, so a list of html`` fragments renders in place.
 *
 * @example
 * const name = '<b>guest</b>';
 * html`<p>Hello, ${name}!</p>`
 * // <p>Hello, &lt;b&gt;guest&lt;/b&gt;!</p>
 */
export function html(strings: TemplateStringsArray, ...values: unknown[]): SafeHtml {
  return new SafeHtml(
    strings.reduce((out, chunk, i) => out + chunk + (i < values.length ? interpolate(values[i]) : ''), '')
  );
}

export function hiddenInput(name: string, value: string): SafeHtml {
  return html`<input type="hidden" name="${name}" value="${value}">`;
}
