/**
 * Naver News layout profile
 *
 * Daily per-press listings (`list.naver?mode=LPOD`) and the standard article view.
 */

import type { SiteProfile } from './types.js';
import { toCompact } from '../utils/calendar.js';

const LISTING_BODY = '#main_content > div.list_body.newsflash_body';

export const NAVER_NEWS_PROFILE: SiteProfile = {
  name: 'naver-news',

  listingUrl(sourceId, date, page) {
    const params = new URLSearchParams({
      mode: 'LPOD',
      mid: 'sec',
      oid: sourceId,
      date: toCompact(date),
      page: String(page),
    });
    return `https://news.naver.com/main/list.naver?${params.toString()}`;
  },

  listing: {
    readySelector: '#main_content > div.list_body',
    referenceSelectors: [
      `${LISTING_BODY} > ul.type06_headline > li dl > dt:not(.photo) > a`,
      `${LISTING_BODY} > ul.type06 > li dl > dt:not(.photo) > a`,
    ],
    pagingSelector: '#main_content > div.paging',
    nextGroupSelector: 'a.next',
  },

  excludedUrlPatterns: [
    /^https?:\/\/(m\.)?entertain\.naver\.com\//,
    /^https?:\/\/(m\.)?sports\.naver\.com\//,
    /^https?:\/\/sports\.news\.naver\.com\//,
  ],

  article: {
    readySelector: '#title_area > span',
    titleSelector: '#title_area > span',
    bodySelector: '#dic_area',
    bodyNoiseSelectors: ['.img_desc', '.media_end_summary'],
    dateStrategies: [
      {
        kind: 'text',
        selector: '.media_end_head_info_datestamp .media_end_head_info_datestamp_time',
      },
      { kind: 'text', selector: '.media_end_head_info_datestamp span' },
      { kind: 'text', selector: '.t11' },
      { kind: 'attribute', selector: '.media_end_head_info_datestamp', attribute: 'data-date-time' },
    ],
  },

  sentinels: {
    title: '제목 없음',
    body: '본문 없음',
    publishedAt: '날짜 없음',
  },
};

export function isExcludedUrl(profile: SiteProfile, url: string): boolean {
  return profile.excludedUrlPatterns.some((pattern) => pattern.test(url));
}
