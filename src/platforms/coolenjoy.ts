/**
 * Coolenjoy 지름 (bbs/jirum), a Nariya-themed gnuboard list.
 * Highlighted notice rows use li.bg-light.
 */

import { defineAdapter } from './adapter.js'

export const coolenjoy = defineAdapter('coolenjoy', {
  anchor: '#bo_list',
  post: 'ul > li',
  skip: '.bg-light',
  title: {
    selectors: ['a.na-subject'],
    strip: ['span.sr-only', 'span.count-plus'],
  },
  link: { selectors: ['a.na-subject'], attrs: ['href'], text: false },
  idPattern: /\/bbs\/jirum\/(\d+)/,
  postedAt: { selectors: ['div.wr-date'], strip: ['span.sr-only'] },
  category: { selectors: ['div.wr-cate'] },
})
