export {
  normalizePhone,
  isInternational,
  PHONE_NORMALIZATION_VERSION,
  PT_COUNTRY_CODE,
} from './normalization.js'
