/**
 * Ruliweb 핫딜 (market/board/1020).
 *
 * Table rows tr.table_body; notices and best rows carry extra classes.
 * td.time shows "HH:mm" for today and "YY.MM.DD" before that.
 */

import { defineAdapter } from './adapter.js'

export const ruliweb = defineAdapter(
  'ruliweb',
  {
    anchor: 'table.board_list_table',
    post: 'tr.table_body',
    skip: '.notice, .best',
    title: {
      selectors: ['a.deco', 'td.subject a.subject_link'],
      strip: ['span.num_reply'],
    },
    link: {
      selectors: ['a.deco', 'td.subject a.subject_link'],
      attrs: ['href'],
      text: false,
    },
    idPattern: /\/read\/(\d+)/,
    postedAt: { selectors: ['td.time'] },
    category: { selectors: ['td.divsn a', 'td.divsn'] },
  },
  { waitFor: 'load', comparableFields: ['priceText', 'title'] }
)
