import assert from 'node:assert'
import { readdir, readFile } from 'node:fs/promises'
import { join, sep } from 'node:path'
import { describe, it } from 'node:test'
import { z } from 'zod'

const packageSchema = z.object({ scripts: z.object({ test: z.string() }) })

describe('npm test script', () => {
  it('should run every test file under tests/', async () => {
    const root = process.cwd()
    const pkg = packageSchema.parse(JSON.parse(await readFile(join(root, 'package.json'), 'utf-8')))
    const listed = pkg.scripts.test.split(/\s+/).filter((part) => part.endsWith('.test.ts'))

    const files = (await readdir(join(root, 'tests'), { recursive: true }))
      .filter((file) => file.endsWith('.test.ts'))
      .map((file) => `tests/${file.split(sep).join('/')}`)
      .sort()

    assert.deepStrictEqual([...listed].sort(), files)
  })
})
