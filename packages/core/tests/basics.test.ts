import { describe, it, expect } from 'vitest'

import { buildPageMeta, pageOffset } from '../src/pagination.js'
import { averageScore, letterGrade } from '../src/grades.js'
import { extensionFor } from '../src/uploads.js'
import { ApiError, NotFoundError, ValidationError } from '../src/errors.js'

describe('pagination', () => {
  it('computes page meta', () => {
    expect(buildPageMeta({ page: 2, limit: 20, total: 45 }, 45)).toEqual({
      page: 2,
      limit: 20,
      total: 45,
      total_pages: 3,
      has_next: true,
      has_prev: true,
    })
    expect(buildPageMeta({ page: 1, limit: 20 }, 0)).toEqual({
      page: 1,
      limit: 20,
      total: 0,
      total_pages: 0,
      has_next: false,
      has_prev: false,
    })
  })

  it('offsets by whole pages', () => {
    expect(pageOffset({ page: 3, limit: 10 })).toBe(20)
    expect(pageOffset({ page: 1, limit: 50 })).toBe(0)
  })
})

describe('grades', () => {
  it('maps scores to letters', () => {
    expect(letterGrade(90)).toBe('A')
    expect(letterGrade(89.99)).toBe('B')
    expect(letterGrade(70)).toBe('C')
    expect(letterGrade(60)).toBe('D')
    expect(letterGrade(59.5)).toBe('F')
  })

  it('averages present scores to two decimals', () => {
    expect(averageScore([90, 85, null, 72])).toBe(82.33)
    expect(averageScore([null, undefined])).toBeNull()
  })
})

describe('uploads', () => {
  it('resolves extensions per kind', () => {
    expect(extensionFor('profile-images', 'image/PNG')).toBe('.png')
    expect(extensionFor('profile-images', 'application/pdf')).toBeNull()
    expect(extensionFor('receipts', 'application/pdf')).toBe('.pdf')
    expect(extensionFor('attachments', 'text/plain; charset=utf-8')).toBe('.txt')
  })
})

describe('errors', () => {
  it('builds envelope bodies', () => {
    expect(new NotFoundError('Student').toBody()).toEqual({ code: 'NOT_FOUND', message: 'Student not found' })
    expect(ValidationError.field('email', 'Required').toBody()).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Required',
      details: { email: ['Required'] },
    })
    expect(new ApiError('CONFLICT', 'x').statusCode).toBe(409)
    expect(new ValidationError('bad query', undefined, 400).statusCode).toBe(400)
  })
})
