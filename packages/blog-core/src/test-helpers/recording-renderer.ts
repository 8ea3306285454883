/**
 * Renderer that records the pages it is asked to render.
 * The body is the page kind so responses stay readable in assertions.
 */

import type { RendererPort } from '../routing/request-ports.js'
import type { BlogPage } from '../renderer/html-renderer.js'
import type { PageContext } from '../renderer/document-wrapper.js'

export interface RenderedCall {
  page: BlogPage
  context: PageContext
}

export class RecordingRenderer implements RendererPort {
  calls: RenderedCall[] = []

  renderPage(page: BlogPage, context: PageContext): string {
    this.calls.push({ page, context })
    return page.kind
  }

  get last(): RenderedCall {
    const call = this.calls.at(-1)
    if (!call) {
      throw new Error('Nothing was rendered')
    }
    return call
  }

  /**
   * The last rendered page, narrowed to the expected kind
   */
  lastPage<K extends BlogPage['kind']>(kind: K): Extract<BlogPage, { kind: K }> {
    const { page } = this.last
    if (!isKind(page, kind)) {
      throw new Error(`Expected a ${kind} page, got ${page.kind}`)
    }
    return page
  }
}

function isKind<K extends BlogPage['kind']>(page: BlogPage, kind: K): page is Extract<BlogPage, { kind: K }> {
  return page.kind === kind
}
