/**
 * Reserved words per target language, read once from data/reserved-words.json
 */

import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { z } from 'zod'

export type TargetLanguage = 'java' | 'kotlin' | 'typescript' | 'python' | 'go' | 'rust'

const reservedWordsSchema = z.object({
  java: z.array(z.string()),
  kotlin: z.array(z.string()),
  typescript: z.array(z.string()),
  python: z.array(z.string()),
  go: z.array(z.string()),
  rust: z.array(z.string()),
})

const RESERVED_WORDS_PATH = fileURLToPath(new URL('../../data/reserved-words.json', import.meta.url))

let cache: Map<TargetLanguage, ReadonlySet<string>> | undefined

function load(): Map<TargetLanguage, ReadonlySet<string>> {
  const words = reservedWordsSchema.parse(JSON.parse(readFileSync(RESERVED_WORDS_PATH, 'utf8')))
  return new Map<TargetLanguage, ReadonlySet<string>>([
    ['java', new Set(words.java)],
    ['kotlin', new Set(words.kotlin)],
    ['typescript', new Set(words.typescript)],
    ['python', new Set(words.python)],
    ['go', new Set(words.go)],
    ['rust', new Set(words.rust)],
  ])
}

export function reservedWords(language: TargetLanguage): ReadonlySet<string> {
  cache ??= load()
  return cache.get(language) ?? new Set()
}
