import type { Value } from "./value.js"

// CHANGE: render Value trees as compact or indented JSON text
// WHY: one total function serves both the library surface and the CLI output
// FORMAT THEOREM: ∀v: parse(serialize(v)) ≡ v for every v produced by parse
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: empty containers render as {} and [] under every indent
// COMPLEXITY: O(n) where n = size of the rendered text

export interface SerializeOptions {
  /** Spaces per nesting level; absent or 0 yields compact output. */
  readonly indent?: number
}

const shortEscapes: ReadonlyMap<number, string> = new Map([
  [0x22, "\\\""],
  [0x5c, "\\\\"],
  [0x08, "\\b"],
  [0x0c, "\\f"],
  [0x0a, "\\n"],
  [0x0d, "\\r"],
  [0x09, "\\t"]
])

const needsEscape = (code: number): boolean => code < 0x20 || code === 0x22 || code === 0x5c

const escapeCode = (code: number): string =>
  shortEscapes.get(code) ?? `\\u${code.toString(16).padStart(4, "0")}`

/**
 * Quote a string as a JSON string literal.
 *
 * @param text - Raw text.
 * @returns Literal with quotes, backslashes and C0 controls escaped.
 *
 * @pure true
 * @invariant characters at or above U+0020 other than `"` and `\` pass through unchanged
 * @complexity O(n)
 */
export const quoteString = (text: string): string => {
  let result = "\""
  let chunkStart = 0
  for (let index = 0; index < text.length; index++) {
    const code = text.charCodeAt(index)
    if (needsEscape(code)) {
      result += text.slice(chunkStart, index) + escapeCode(code)
      chunkStart = index + 1
    }
  }
  return result + text.slice(chunkStart) + "\""
}

// String(n) is already the shortest round-trip form; only -0 and non-finite need care.
export const formatNumber = (value: number): string => {
  if (!Number.isFinite(value)) {
    return "null"
  }
  return Object.is(value, -0) ? "-0" : String(value)
}

const normalizeIndent = (indent: number | undefined): number =>
  indent === undefined || !Number.isFinite(indent) || indent <= 0 ? 0 : Math.floor(indent)

interface Layout {
  readonly indent: number
  readonly colon: string
}

const newline = (layout: Layout, level: number): string =>
  layout.indent === 0 ? "" : "\n" + " ".repeat(layout.indent * level)

const write = (value: Value, layout: Layout, level: number, out: Array<string>): void => {
  switch (value._tag) {
    case "Null":
      out.push("null")
      return
    case "Bool":
      out.push(value.value ? "true" : "false")
      return
    case "Number":
      out.push(formatNumber(value.value))
      return
    case "String":
      out.push(quoteString(value.value))
      return
    case "Array": {
      if (value.items.length === 0) {
        out.push("[]")
        return
      }
      const inner = newline(layout, level + 1)
      out.push("[")
      value.items.forEach((item, index) => {
        out.push(index === 0 ? inner : "," + inner)
        write(item, layout, level + 1, out)
      })
      out.push(newline(layout, level), "]")
      return
    }
    case "Object": {
      if (value.entries.size === 0) {
        out.push("{}")
        return
      }
      const inner = newline(layout, level + 1)
      let first = true
      out.push("{")
      for (const [key, member] of value.entries) {
        out.push(first ? inner : "," + inner, quoteString(key), layout.colon)
        write(member, layout, level + 1, out)
        first = false
      }
      out.push(newline(layout, level), "}")
      return
    }
  }
}

/**
 * Serialize a Value tree.
 *
 * @param value - Tree to render; never mutated.
 * @param options - Layout; `indent` is clamped to a non-negative integer.
 * @returns JSON text without a trailing newline.
 *
 * @pure true
 * @invariant total: never throws for a Value tree
 * @complexity O(n)
 */
export const serialize = (value: Value, options: SerializeOptions = {}): string => {
  const indent = normalizeIndent(options.indent)
  const out: Array<string> = []
  write(value, { indent, colon: indent === 0 ? ":" : ": " }, 0, out)
  return out.join("")
}
