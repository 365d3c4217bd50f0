import { ValidationError } from '@/lib/errors'
import { isValidUUID, validateId } from '@/lib/validation/uuid'

describe('isValidUUID', () => {
  it.each([
    '8c7f6d2e-1b3a-4c5d-9e8f-0a1b2c3d4e5f',
    '8C7F6D2E-1B3A-4C5D-9E8F-0A1B2C3D4E5F',
    '00000000-0000-1000-8000-000000000001',
  ])('accepts %s', (id) => {
    expect(isValidUUID(id)).toBe(true)
  })

  it.each([
    '',
    'not-a-uuid',
    '8c7f6d2e1b3a4c5d9e8f0a1b2c3d4e5f',
    '8c7f6d2e-1b3a-4c5d-9e8f-0a1b2c3d4e5',
    '8c7f6d2e-1b3a-0c5d-9e8f-0a1b2c3d4e5f',
    "8c7f6d2e-1b3a-4c5d-9e8f-0a1b2c3d4e5f' OR 1=1",
  ])('rejects %j', (id) => {
    expect(isValidUUID(id)).toBe(false)
  })
})

describe('validateId', () => {
  it('returns a valid id unchanged', () => {
    expect(validateId('8c7f6d2e-1b3a-4c5d-9e8f-0a1b2c3d4e5f')).toBe(
      '8c7f6d2e-1b3a-4c5d-9e8f-0a1b2c3d4e5f'
    )
  })

  it('names the field in the error', () => {
    expect(() => validateId('42', 'trial id')).toThrow(new ValidationError('Invalid trial id format'))
  })

  it('defaults the field name to id', () => {
    expect(() => validateId('42')).toThrow('Invalid id format')
  })
})
