/**
 * Clien 알뜰구매 (jirum) board.
 *
 * div.contents_jirum > div.list_item, one per post. The hover popover carries
 * the full timestamp in span.timestamp; the visible time is "HH:mm" or "MM-DD".
 * Pages: ?po=0, ?po=1, ...
 */

import { defineAdapter } from './adapter.js'

export const clien = defineAdapter('clien', {
  anchor: 'div.contents_jirum',
  post: 'div.list_item',
  skip: '.notice, .blocked',
  title: {
    selectors: ['span.subject_fixed', 'span.list_subject', 'a.list_subject'],
    attrs: ['title'],
  },
  link: {
    selectors: ['a.list_subject', 'a[href*="/service/board/jirum/"]'],
    attrs: ['href'],
    text: false,
  },
  idPattern: /\/service\/board\/jirum\/(\d+)/,
  postedAt: {
    selectors: ['span.timestamp', 'div.list_time span.time'],
    strip: ['span.timestamp'],
  },
  image: {
    selectors: ['div.list_img img', 'img'],
    attrs: ['src', 'data-src'],
    text: false,
  },
  category: {
    selectors: ['span.category_fixed', 'span.category'],
  },
})
