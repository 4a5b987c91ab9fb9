/**
 * Eomisae 핫딜 (/rt), card layout.
 *
 * Posts tagged "미달 조건" did not meet the board's deal threshold and are
 * not deals. Dates only appear on the post page, as "YY.MM.DD HH:mm:ss".
 */

import { defineAdapter } from './adapter.js'

export const eomisae = defineAdapter('eomisae', {
  anchor: 'div.bd_card',
  post: 'div.card_el',
  excludeTitle: /미달 조건/,
  title: { selectors: ['a.card_title', '.card_title a', 'a[class*="title"]'] },
  link: { selectors: ['a.card_title', '.card_title a', 'a[class*="title"]'], attrs: ['href'], text: false },
  idPattern: /(?:\/rt\/|document_srl=)(\d+)/,
  image: { selectors: ['.card_img img', '[class*="thumb"] img', 'img'], attrs: ['src', 'data-src'], text: false },
  category: { selectors: ['.cate'] },
  detail: {
    postedAt: { selectors: ['#D_ > div._wrapper > div._hd.clear > div.btm_area.clear > span:nth-child(10)'] },
  },
})
