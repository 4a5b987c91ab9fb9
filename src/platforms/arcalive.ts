/**
 * Arcalive 핫딜 채널 (/b/hotdeal).
 *
 * The list is client-rendered, so pages wait for network idle. Rows carry
 * no usable date; the post page has a <time datetime> in UTC and the
 * category badge.
 */

import { defineAdapter } from './adapter.js'

export const arcalive = defineAdapter(
  'arcalive',
  {
    anchor: 'div.list-table',
    post: 'div.vrow',
    skip: '.notice',
    title: { selectors: ['a.title'], strip: ['span.comment-count'] },
    link: { selectors: ['a.title'], attrs: ['href'], text: false },
    idPattern: /\/b\/hotdeal\/(\d+)/,
    price: { selectors: ['span.deal-price'] },
    image: { selectors: ['a.vrow-preview img'], attrs: ['src', 'data-src'], text: false },
    detail: {
      postedAt: { selectors: ['div.article-info time[datetime]', 'time[datetime]'], attrs: ['datetime'] },
      category: { selectors: ['span.category-badge'] },
    },
  },
  { waitFor: 'networkidle' }
)
