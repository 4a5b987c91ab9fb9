/**
 * Quasarzone 지름/할인정보 (qb_saleinfo).
 *
 * The listing shows the price in its own span, and relative times
 * ("5분 전") for fresh posts.
 */

import { defineAdapter } from './adapter.js'

export const quasarzone = defineAdapter('quasarzone', {
  anchor: 'div.market-type-list.market-info-type-list',
  post: 'table tbody tr',
  title: {
    selectors: ['p.tit a span.ellipsis-with-reply-cnt', 'p.tit a'],
    strip: ['span.board-list-comment'],
  },
  link: { selectors: ['p.tit a'], attrs: ['href'], text: false },
  idPattern: /\/views\/(\d+)/,
  postedAt: { selectors: ['span.date', 'td.date'], attrs: ['title'] },
  price: { selectors: ['span.text-orange'] },
  image: {
    selectors: ['div.thumb-wrap img', 'img'],
    attrs: ['src', 'data-src'],
    text: false,
  },
  category: { selectors: ['span.category', 'td.category'] },
})
