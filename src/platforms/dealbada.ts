/**
 * Dealbada 국내 딜 (bo_table=deal_domestic), a stock gnuboard table.
 * Post ids are the wr_id query parameter.
 */

import { defineAdapter } from './adapter.js'

export const dealbada = defineAdapter('dealbada', {
  anchor: '#fboardlist',
  post: 'tbody > tr',
  skip: '.bo_notice, .best_article',
  title: {
    selectors: ['td.td_subject a'],
    strip: ['span.cnt_cmt', 'span.sound_only'],
  },
  link: { selectors: ['td.td_subject a'], attrs: ['href'], text: false },
  idPattern: /[?&]wr_id=(\d+)/,
  postedAt: { selectors: ['td.td_date'] },
  image: { selectors: ['td.td_img img'], attrs: ['src', 'data-src'], text: false },
  category: { selectors: ['td.td_cate'] },
})
