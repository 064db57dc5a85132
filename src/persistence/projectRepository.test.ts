import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { addCircuit, createProject } from '../circuit/project'
import { buildTwoInputGate } from '../test/builders'
import { FileProjectRepository } from './projectRepository'

describe('FileProjectRepository', () => {
  let directory: string

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'lcp-repo-'))
  })

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  function demoProject(name: string) {
    const project = createProject(name)
    addCircuit(project, buildTwoInputGate('OR', 'Either').circuit)
    return project
  }

  it('should save a project as <name>.lcp and load it back', async () => {
    const repository = new FileProjectRepository(directory)
    const path = await repository.save(demoProject('Alpha'))

    expect(path).toBe(join(directory, 'Alpha.lcp'))
    const loaded = await repository.load(path)
    expect(loaded.name).toBe('Alpha')
    expect(loaded.path).toBe(path)
    expect(loaded.circuits.map((c) => c.name)).toEqual(['Either'])
    expect(loaded.circuits[0]?.connectors).toHaveLength(3)
  })

  it('should create the directory on first save', async () => {
    const repository = new FileProjectRepository(join(directory, 'nested', 'projects'))
    await repository.save(demoProject('Alpha'))
    expect(await readdir(join(directory, 'nested', 'projects'))).toEqual(['Alpha.lcp'])
  })

  it('should list every readable project and skip the rest', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const repository = new FileProjectRepository(directory)
    await repository.save(demoProject('Beta'))
    await repository.save(demoProject('Alpha'))
    await writeFile(join(directory, 'Broken.lcp'), '{ not json', 'utf-8')
    await writeFile(join(directory, 'notes.txt'), 'ignored', 'utf-8')

    const projects = await repository.listAll()
    expect(projects.map((p) => p.name)).toEqual(['Alpha', 'Beta'])
    expect(warn).toHaveBeenCalledWith(
      'Skipping unreadable project file:',
      join(directory, 'Broken.lcp'),
      'File is not valid JSON'
    )
  })

  it('should list nothing for a directory that does not exist', async () => {
    const repository = new FileProjectRepository(join(directory, 'missing'))
    expect(await repository.listAll()).toEqual([])
  })

  it('should delete a saved project and ignore one that was never saved', async () => {
    const repository = new FileProjectRepository(directory)
    const alpha = demoProject('Alpha')
    await repository.save(alpha)

    await repository.delete(alpha)
    await repository.delete(demoProject('Gamma'))
    expect(await readdir(directory)).toEqual([])
  })
})
