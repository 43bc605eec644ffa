/**
 * Tests for secret reconciliation against the in-memory vault
 */

import { describe, it, expect, beforeEach, vi } from 'vitest'
import { reconcile, needsChange } from '../../reconciler/reconcile'
import { buildSecretSpec } from '../../reconciler/secret-spec'
import { InMemorySecretStore } from '../../secrets/in-memory-secrets'
import type { SecretStore } from '../../secrets/types'
import { RemoteError } from '../../errors'
import type { SecretSpec } from '../../reconciler/types'

const VAULT = 'https://contoso.vault.azure.net/'
const VERSIONED_ID = /^https:\/\/contoso\.vault\.azure\.net\/secrets\/MySecret\/[0-9a-f]{32}$/

function presentSpec(value = 'My_Pass_Sec'): SecretSpec {
  return buildSecretSpec({
    secret_name: 'MySecret',
    secret_value: value,
    keyvault_uri: VAULT,
    state: 'present',
  })
}

function absentSpec(): SecretSpec {
  return buildSecretSpec({ secret_name: 'MySecret', keyvault_uri: VAULT, state: 'absent' })
}

describe('reconcile', () => {
  let store: InMemorySecretStore

  beforeEach(() => {
    store = new InMemorySecretStore(VAULT)
  })

  describe('present', () => {
    it('should create a missing secret', async () => {
      const result = await reconcile(store, presentSpec())

      expect(result.changed).toBe(true)
      expect(result.state.status).toBe('Created')
      expect(result.state.secret_id).toMatch(VERSIONED_ID)

      const stored = await store.getSecret('MySecret')
      expect(stored.value).toBe('My_Pass_Sec')
      expect(stored.id).toBe(result.state.secret_id)
    })

    it('should be idempotent', async () => {
      await reconcile(store, presentSpec())
      const second = await reconcile(store, presentSpec())

      expect(second.changed).toBe(false)
      expect(second.state.status).toBeUndefined()
      expect(second.state.secret_id).toMatch(VERSIONED_ID)
    })

    it('should write a new version when the value differs', async () => {
      const first = await reconcile(store, presentSpec('old-value'))
      const second = await reconcile(store, presentSpec('new-value'))

      expect(second.changed).toBe(true)
      expect(second.state.status).toBe('Created')
      expect(second.state.secret_id).toMatch(VERSIONED_ID)
      expect(second.state.secret_id).not.toBe(first.state.secret_id)
      expect((await store.getSecret('MySecret')).value).toBe('new-value')
    })

    it('should compare values exactly', async () => {
      await reconcile(store, presentSpec('value'))
      const result = await reconcile(store, presentSpec('value '))

      expect(result.changed).toBe(true)
    })

    it('should pass tags, content type and validity window to the vault', async () => {
      const setSpy = vi.spyOn(store, 'setSecret')
      const spec = buildSecretSpec({
        secret_name: 'MySecret',
        secret_value: 'My_Pass_Sec',
        keyvault_uri: VAULT,
        state: 'present',
        content_type: 'password',
        tags: { testing: 'testing', delete: 'never' },
        secret_valid_from: '2030-01-01',
        secret_expiry: '2031-01-01 12:30:00',
      })

      await reconcile(store, spec)

      expect(setSpy).toHaveBeenCalledWith('MySecret', 'My_Pass_Sec', {
        tags: { testing: 'testing', delete: 'never' },
        contentType: 'password',
        notBefore: new Date('2030-01-01T00:00:00Z'),
        expiresOn: new Date('2031-01-01T12:30:00Z'),
      })
      const stored = await store.getSecret('MySecret')
      expect(stored.contentType).toBe('password')
      expect(stored.tags).toEqual({ testing: 'testing', delete: 'never' })
    })

    it('should never put the value in the result', async () => {
      const result = await reconcile(store, presentSpec())

      expect(Object.keys(result.state).sort()).toEqual(['secret_id', 'status'])
      expect(JSON.stringify(result)).not.toContain('My_Pass_Sec')
    })
  })

  describe('absent', () => {
    it('should delete an existing secret', async () => {
      await reconcile(store, presentSpec())
      const result = await reconcile(store, absentSpec())

      expect(result.changed).toBe(true)
      expect(result.state.status).toBe('Deleted')
      expect(result.state.secret_id).toMatch(VERSIONED_ID)
      expect(store.listDeleted()).toEqual(['MySecret'])
    })

    it('should do nothing when the secret does not exist', async () => {
      const deleteSpy = vi.spyOn(store, 'deleteSecret')
      const setSpy = vi.spyOn(store, 'setSecret')

      const result = await reconcile(store, absentSpec())

      expect(result).toEqual({ changed: false, state: {} })
      expect(deleteSpy).not.toHaveBeenCalled()
      expect(setSpy).not.toHaveBeenCalled()
    })
  })

  describe('check mode', () => {
    it('should report a create without writing', async () => {
      const setSpy = vi.spyOn(store, 'setSecret')

      const result = await reconcile(store, presentSpec(), { checkMode: true })

      expect(result).toEqual({ changed: true, state: { status: 'Created' } })
      expect(setSpy).not.toHaveBeenCalled()
      await expect(store.getSecret('MySecret')).rejects.toThrow('Secret not found: MySecret')
    })

    it('should report a delete without writing', async () => {
      await reconcile(store, presentSpec())
      const existing = await store.getSecret('MySecret')
      const deleteSpy = vi.spyOn(store, 'deleteSecret')

      const result = await reconcile(store, absentSpec(), { checkMode: true })

      expect(result).toEqual({ changed: true, state: { secret_id: existing.id, status: 'Deleted' } })
      expect(deleteSpy).not.toHaveBeenCalled()
    })

    it('should report an update without writing', async () => {
      await reconcile(store, presentSpec('old-value'))
      const setSpy = vi.spyOn(store, 'setSecret')

      const result = await reconcile(store, presentSpec('new-value'), { checkMode: true })

      expect(result.changed).toBe(true)
      expect(result.state.status).toBe('Created')
      expect(setSpy).not.toHaveBeenCalled()
      expect((await store.getSecret('MySecret')).value).toBe('old-value')
    })
  })

  describe('errors', () => {
    it('should propagate read failures other than not-found', async () => {
      const failing: SecretStore = {
        vaultUri: VAULT,
        getSecret: async () => {
          throw new RemoteError('Failed to get secret MySecret: Forbidden', 403, 'Forbidden')
        },
        setSecret: vi.fn(),
        deleteSecret: vi.fn(),
      }

      await expect(reconcile(failing, presentSpec())).rejects.toThrow('Failed to get secret MySecret: Forbidden')
      expect(failing.setSecret).not.toHaveBeenCalled()
    })

    it('should propagate write failures', async () => {
      vi.spyOn(store, 'setSecret').mockRejectedValue(new RemoteError('Failed to set secret MySecret: Conflict', 409))

      await expect(reconcile(store, presentSpec())).rejects.toBeInstanceOf(RemoteError)
    })
  })
})

describe('needsChange', () => {
  const existing = { id: `${VAULT}secrets/MySecret/abc`, name: 'MySecret', value: 'My_Pass_Sec' }

  it('should decide every combination of desired and observed state', () => {
    expect(needsChange(presentSpec(), null)).toBe(true)
    expect(needsChange(presentSpec(), existing)).toBe(false)
    expect(needsChange(presentSpec('other'), existing)).toBe(true)
    expect(needsChange(absentSpec(), null)).toBe(false)
    expect(needsChange(absentSpec(), existing)).toBe(true)
  })
})
