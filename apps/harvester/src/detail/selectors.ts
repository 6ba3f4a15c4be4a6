/**
 * Detail Page Selectors
 *
 * Ordered candidate lists; the first selector whose first element has
 * usable text wins. Desktop data-testid hooks come first, hashed css-*
 * class names and generic tags last.
 */

export const TITLE_SELECTORS = [
  'h1[data-testid="listing-title"]',
  'h1.css-r9zjja-Text',
  'h1',
  '[data-testid="listing-title"]',
  'h1[class*="title"]',
] as const

export const PRICE_SELECTORS = [
  '[data-testid*="price"]',
  'h3[data-testid*="price"]',
  'span[data-testid*="price"]',
  'h3.css-okktvh-Text',
  '[class*="price"]',
  'h3[class*="price"]',
  '.price',
] as const

export const SELECTORS = {
  description: '[data-cy="ad_description"], [data-testid="ad-description"], #textContent',

  // Gallery images (src or lazy-load attributes)
  images: '[data-testid="swiper-image"], [data-testid="ad-photo"] img, .swiper-zoom-container img',

  location: '[data-testid="location-date"], [data-testid="ad-location"], [data-testid="map-aside-section"] p',

  sellerName: '[data-testid="user-profile-user-name"], [data-testid="seller-name"], .user-box__info-name',
  sellerJoinDate: '[data-testid="member-since"]',
  sellerLastOnline: '[data-testid="lastSeenBox"]',

  phone: 'a[href^="tel:"]',
  phoneButton: '[data-testid="ad-contact-phone"], [data-testid="show-phone"]',
  messageButton: '[data-testid="ad-contact-message-button"], [data-cy="ad-contact-message-button"]',

  postedAt: '[data-cy="ad-posting-time"], [data-testid="ad-posted-at"]',
  viewCount: '[data-testid="page-view-counter"], [data-testid="page-view-text"]',

  parameters: '[data-testid="ad-parameters-container"] p, [data-testid="ad-parameters-container"] li',
  breadcrumbs: '[data-testid="breadcrumb-item"] a, [data-testid="breadcrumbs"] a',
} as const
