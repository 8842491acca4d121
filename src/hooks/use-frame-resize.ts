'use client'

import { useEffect, type RefObject } from 'react'

export interface ResizeMessage {
  type: 'resize'
  height: number
}

interface MessageTarget {
  postMessage(message: ResizeMessage, targetOrigin: string): void
}

/**
 * Returns a callback that posts the measured height to `target`, skipping
 * repeats of the last height sent.
 */
export function createResizeReporter(target: MessageTarget, measure: () => number, targetOrigin: string = '*'): () => void {
  let lastHeight = -1
  return () => {
    const height = Math.ceil(measure())
    if (height <= 0 || height === lastHeight) return
    lastHeight = height
    target.postMessage({ type: 'resize', height }, targetOrigin)
  }
}

export function measureHeight(element: HTMLElement): number {
  return Math.max(element.scrollHeight, element.getBoundingClientRect().height)
}

/**
 * Keeps the embedding page informed of this document's height. Does nothing
 * when the page is not inside a frame.
 */
export function useFrameResize(ref: RefObject<HTMLElement | null>): void {
  useEffect(() => {
    if (typeof window === 'undefined' || window.parent === window) return

    const element = ref.current ?? document.body
    const report = createResizeReporter(window.parent, () => measureHeight(element))
    report()

    if (typeof ResizeObserver === 'undefined') {
      window.addEventListener('load', report)
      return () => window.removeEventListener('load', report)
    }

    const observer = new ResizeObserver(report)
    observer.observe(element)
    return () => observer.disconnect()
  }, [ref])
}
