import { StructureError } from "../errors/errors"

/**
 * Splits a command line into words the way a POSIX shell would: whitespace
 * separates words, single quotes are literal, double quotes allow `\"` and
 * `\\`, and a backslash outside quotes escapes the next character.
 */
export function splitCommandLine(line: string): string[] {
  const words: string[] = []
  let word = ""
  let inWord = false
  let quote: "'" | '"' | undefined

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i)

    if (quote === "'") {
      if (char === "'") quote = undefined
      else word += char
      continue
    }

    if (quote === '"') {
      if (char === '"') {
        quote = undefined
      } else if (char === "\\" && (line[i + 1] === '"' || line[i + 1] === "\\")) {
        word += line.charAt(++i)
      } else {
        word += char
      }
      continue
    }

    if (char === "'" || char === '"') {
      quote = char
      inWord = true
    } else if (char === "\\" && i + 1 < line.length) {
      word += line.charAt(++i)
      inWord = true
    } else if (/\s/.test(char)) {
      if (inWord) words.push(word)
      word = ""
      inWord = false
    } else {
      word += char
      inWord = true
    }
  }

  if (quote) throw new StructureError(`Unterminated ${quote} quote in command line`, { line })
  if (inWord) words.push(word)

  return words
}
