import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

export interface TraceDir {
  path: string
  write(name: string, lines: string[]): Promise<string>
  cleanup(): Promise<void>
}

export async function createTraceDir(): Promise<TraceDir> {
  const path = await mkdtemp(join(tmpdir(), 'cache-lab-'))
  return {
    path,
    async write(name, lines) {
      const file = join(path, name)
      await writeFile(file, lines.join('\n') + '\n', 'utf8')
      return file
    },
    cleanup: () => rm(path, { recursive: true, force: true }),
  }
}

// node-style argv for main()
export const argv = (...args: string[]) => ['node', 'cache-lab', ...args]
