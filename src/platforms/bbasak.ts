/**
 * Bbasak 해외 핫딜 (bo_table=bbasak2), a gnuboard table.
 *
 * table.t1 rows with the category in the second cell and the thumbnail in the
 * fourth. The list has no dates; the post page shows "YY-MM-DD HH:mm".
 */

import { defineAdapter } from './adapter.js'

export const bbasak = defineAdapter('bbasak', {
  anchor: 'table.t1',
  post: 'tbody > tr',
  skip: '.bo_notice',
  title: { selectors: ['td.tit a'], strip: ['span.cnt_cmt'] },
  link: { selectors: ['td.tit a'], attrs: ['href'], text: false },
  idPattern: /[?&]wr_id=(\d+)/,
  image: { selectors: ['td:nth-child(4) > a > img'], attrs: ['src'], text: false },
  category: { selectors: ['td:nth-child(2)'] },
  detail: {
    postedAt: { selectors: ['div.view_title.s_title > div > p.info > span:nth-child(2) > span:nth-child(1)'] },
  },
})
