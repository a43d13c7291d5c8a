export { merchantChars, isBlankMerchant } from './normalize.js';
export { amountsMatch } from './amount.js';
