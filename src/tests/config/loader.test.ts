import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { loadModuleArgs, parseModuleArgs } from '../../config/loader'
import { ValidationError } from '../../errors'

describe('Args loader', () => {
  let dir: string

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'keyvault-secret-args-'))
  })

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should parse JSON', () => {
    expect(parseModuleArgs('{"secret_name": "MySecret", "state": "absent"}')).toEqual({
      secret_name: 'MySecret',
      state: 'absent',
    })
  })

  it('should parse YAML', () => {
    const yaml = [
      'secret_name: MySecret',
      'secret_value: My_Pass_Sec',
      'keyvault_uri: https://contoso.vault.azure.net/',
      'tags:',
      '  testing: testing',
      '  delete: never',
    ].join('\n')

    expect(parseModuleArgs(yaml)).toEqual({
      secret_name: 'MySecret',
      secret_value: 'My_Pass_Sec',
      keyvault_uri: 'https://contoso.vault.azure.net/',
      tags: { testing: 'testing', delete: 'never' },
    })
  })

  it('should treat an empty document as no arguments', () => {
    expect(parseModuleArgs('')).toEqual({})
  })

  it('should reject documents that are not mappings', () => {
    expect(() => parseModuleArgs('- a\n- b', 'stdin')).toThrow('Module arguments in stdin must be a mapping')
  })

  it('should report syntax errors without the document contents', () => {
    let caught: unknown
    try {
      parseModuleArgs('secret_value: "hunter2', 'args.yml')
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ValidationError)
    expect(caught).toMatchObject({ message: expect.stringMatching(/^Failed to parse module arguments from args\.yml: /) })
    expect(caught).not.toMatchObject({ message: expect.stringContaining('hunter2') })
  })

  it('should load an args file', () => {
    const file = join(dir, 'args.json')
    writeFileSync(file, JSON.stringify({ secret_name: 'MySecret', state: 'absent' }))

    expect(loadModuleArgs(file)).toEqual({ secret_name: 'MySecret', state: 'absent' })
  })

  it('should fail for a missing file', () => {
    expect(() => loadModuleArgs(join(dir, 'missing.json'))).toThrow(ValidationError)
  })
})
