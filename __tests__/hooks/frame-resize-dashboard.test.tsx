// @vitest-environment jsdom
import { QueryClient, QueryClientProvider } from '@tanstack/react-query'
import { cleanup, render } from '@testing-library/react'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { Dashboard } from '@/components/dashboard/Dashboard'
import { getCatalogEntry } from '@/lib/indicators/catalog'

const parentDescriptor = Object.getOwnPropertyDescriptor(window, 'parent')

function renderDashboard() {
  render(
    <QueryClientProvider client={new QueryClient()}>
      <Dashboard catalog={[getCatalogEntry('nfci')]} />
    </QueryClientProvider>
  )
}

describe('useFrameResize in the dashboard', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockResolvedValue(new Response('Not Found', { status: 404 })))
    vi.spyOn(Element.prototype, 'scrollHeight', 'get').mockReturnValue(640)
  })

  afterEach(() => {
    cleanup()
    if (parentDescriptor) Object.defineProperty(window, 'parent', parentDescriptor)
    else Reflect.deleteProperty(window, 'parent')
    vi.restoreAllMocks()
    vi.unstubAllGlobals()
  })

  it('posts its height to the embedding page on mount', () => {
    const postMessage = vi.fn()
    Object.defineProperty(window, 'parent', { configurable: true, get: () => ({ postMessage }) })

    renderDashboard()

    expect(postMessage).toHaveBeenCalledWith({ type: 'resize', height: 640 }, '*')
  })

  it('posts nothing when the page is not framed', () => {
    expect(window.parent).toBe(window)
    const postMessage = vi.spyOn(window, 'postMessage')

    renderDashboard()

    expect(postMessage).not.toHaveBeenCalled()
  })
})
