export { tokenizeRow, unconsumedTokens, stripNoise } from './tokens.js';
export { extractAmount, extractAmountSequence } from './amount.js';
export { extractDate } from './date.js';
export { extractWarrant } from './warrant.js';
export { extractAccountCode } from './account-code.js';
export { extractVoidMarker } from './void-marker.js';
export { extractPayee } from './payee.js';
