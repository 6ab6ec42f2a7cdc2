/**
 * HTML module - escaping and tag helpers for transcript pages
 *
 * @example
 * ```ts
 * import { escapeHtml, htmlTag } from "vtt-transcript/html";
 *
 * escapeHtml(">> Tom & Jerry");
 * // "&gt;&gt; Tom &amp; Jerry"
 *
 * htmlTag("p", { class: "turn" }, ">> Hello");
 * // '<p class="turn">&gt;&gt; Hello</p>'
 * ```
 */

const ENTITIES: Record<string, string> = {
	'&': '&amp;',
	'<': '&lt;',
	'>': '&gt;',
	'"': '&quot;',
	"'": '&#x27;',
}

/**
 * Escape HTML special characters: & < > " '
 *
 * @example
 * ```ts
 * escapeHtml("<script>alert('xss')</script>");
 * // "&lt;script&gt;alert(&#x27;xss&#x27;)&lt;/script&gt;"
 * ```
 */
export function escapeHtml(input: string): string {
	return input.replace(/[&<>"']/g, (char) => ENTITIES[char] ?? char)
}

/** Attribute value types for htmlTag */
type AttrValue = string | number | boolean | null | undefined

/**
 * Generate an HTML element with escaped attributes and content
 *
 * `true` renders a bare attribute; `false`, `null` and `undefined` are
 * skipped. Content is always escaped.
 *
 * @example
 * ```ts
 * htmlTag("p", { id: "turn-1", hidden: true }, ">> Hi");
 * // '<p id="turn-1" hidden>&gt;&gt; Hi</p>'
 * ```
 */
export function htmlTag(
	tag: string,
	attrs?: Record<string, AttrValue>,
	content?: string,
): string {
	const attrStr = attrs
		? Object.entries(attrs)
				.filter(([, v]) => v != null && v !== false)
				.map(([k, v]) => (v === true ? k : `${k}="${escapeHtml(String(v))}"`))
				.join(' ')
		: ''

	const attrPart = attrStr ? ` ${attrStr}` : ''

	const innerContent = content === undefined ? '' : escapeHtml(content)

	return `<${tag}${attrPart}>${innerContent}</${tag}>`
}
