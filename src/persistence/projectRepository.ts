import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { Project } from '../types'
import { PROJECT_FILE_EXTENSION } from '../config'
import { parseProjectFile, stringifyProject } from '../utils/projectFile'

export interface ProjectRepository {
  // Returns the path the project was written to
  save(project: Project): Promise<string>
  load(path: string): Promise<Project>
  delete(project: Project): Promise<void>
  listAll(): Promise<Project[]>
}

/**
 * Stores each project as `<name>.lcp` in one directory. The directory is
 * created on first save.
 */
export class FileProjectRepository implements ProjectRepository {
  private readonly baseDirectory: string

  constructor(baseDirectory: string) {
    this.baseDirectory = baseDirectory
  }

  pathFor(project: Project): string {
    return join(this.baseDirectory, `${project.name}${PROJECT_FILE_EXTENSION}`)
  }

  async save(project: Project): Promise<string> {
    const path = this.pathFor(project)
    await mkdir(this.baseDirectory, { recursive: true })
    await writeFile(path, stringifyProject(project), 'utf-8')
    return path
  }

  async load(path: string): Promise<Project> {
    const text = await readFile(path, 'utf-8')
    return parseProjectFile(text, path)
  }

  async delete(project: Project): Promise<void> {
    await rm(this.pathFor(project), { force: true })
  }

  async listAll(): Promise<Project[]> {
    let entries: string[]
    try {
      entries = await readdir(this.baseDirectory)
    } catch (e) {
      if (isMissingDirectory(e)) return []
      throw e
    }

    const projects: Project[] = []
    for (const entry of entries.filter((name) => name.endsWith(PROJECT_FILE_EXTENSION)).sort()) {
      const path = join(this.baseDirectory, entry)
      try {
        projects.push(await this.load(path))
      } catch (e) {
        console.warn('Skipping unreadable project file:', path, e instanceof Error ? e.message : e)
      }
    }
    return projects
  }
}

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
