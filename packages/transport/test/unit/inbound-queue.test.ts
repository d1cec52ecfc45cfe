import { describe, expect, it } from 'vitest'
import { InboundQueue } from '../../src/queue/inbound-queue.js'

describe('InboundQueue', () => {
  it('should drain items oldest first', () => {
    const queue = new InboundQueue<string>()
    queue.push('a')
    queue.push('b')
    queue.push('c')

    expect(queue.size).toBe(3)
    expect(queue.drain()).toEqual(['a', 'b', 'c'])
    expect(queue.isEmpty()).toBe(true)
  })

  it('should return an empty list when nothing is queued', () => {
    expect(new InboundQueue<number>().drain()).toEqual([])
  })

  it('should hand items out one at a time', () => {
    const queue = new InboundQueue<number>()
    queue.push(1)
    queue.push(2)

    expect(queue.shift()).toBe(1)
    expect(queue.shift()).toBe(2)
    expect(queue.shift()).toBeUndefined()
  })

  it('should report nothing arrived after the timeout', async () => {
    const queue = new InboundQueue<string>()

    await expect(queue.waitForItems(20)).resolves.toBe(false)
  })

  it('should not wait when items are already queued', async () => {
    const queue = new InboundQueue<string>()
    queue.push('ready')

    await expect(queue.waitForItems(0)).resolves.toBe(true)
    expect(queue.size).toBe(1)
  })

  it('should wake up as soon as an item is pushed', async () => {
    const queue = new InboundQueue<string>()
    setTimeout(() => queue.push('late'), 10)

    await expect(queue.drainWhenReady(1000)).resolves.toEqual(['late'])
  })

  it('should drain nothing when the wait times out', async () => {
    const queue = new InboundQueue<string>()

    await expect(queue.drainWhenReady(10)).resolves.toEqual([])
  })
})
