import { describe, expect, it } from 'vitest'
import {
  filteredLogger,
  isLogLevel,
  LogStore,
  prefixedLogger,
  storeLogger,
} from './logger.js'

describe('LogStore', () => {
  it('records entries with increasing ids', () => {
    const store = new LogStore()
    const logger = storeLogger(store)

    logger.info('first')
    logger.error('second', 42)

    expect(store.getEntries().map(({ id, level, message, args }) => ({ id, level, message, args }))).toEqual([
      { id: 0, level: 'info', message: 'first', args: [] },
      { id: 1, level: 'error', message: 'second', args: [42] },
    ])
    expect(store.entriesAt('error')).toHaveLength(1)
    expect(store.size).toBe(2)
  })

  it('notifies subscribers until they unsubscribe', () => {
    const store = new LogStore()
    const seen: string[] = []
    const unsubscribe = store.subscribe((entry) => seen.push(entry.message))

    store.add('warn', 'a', [])
    unsubscribe()
    store.add('warn', 'b', [])

    expect(seen).toEqual(['a'])
  })
})

describe('prefixedLogger', () => {
  it('prefixes every message', () => {
    const store = new LogStore()
    prefixedLogger('handwire', storeLogger(store)).warn('careful', 'detail')

    expect(store.getEntries()[0]).toMatchObject({
      level: 'warn',
      message: '[handwire] careful',
      args: ['detail'],
    })
  })
})

describe('filteredLogger', () => {
  it('drops messages below the minimum level', () => {
    const store = new LogStore()
    const logger = filteredLogger('warn', storeLogger(store))

    logger.debug('d')
    logger.info('i')
    logger.warn('w')
    logger.error('e')

    expect(store.getEntries().map((e) => e.message)).toEqual(['w', 'e'])
  })

  it('passes everything at debug', () => {
    const store = new LogStore()
    const logger = filteredLogger('debug', storeLogger(store))

    logger.debug('d')
    logger.info('i')

    expect(store.size).toBe(2)
  })
})

describe('isLogLevel', () => {
  it('accepts only known levels', () => {
    expect(isLogLevel('info')).toBe(true)
    expect(isLogLevel('verbose')).toBe(false)
  })
})
