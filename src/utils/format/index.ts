export {
  formatBlockLifecycle,
  formatTransactionDetails,
  TRANSACTION_DETAIL_LIMIT,
} from './lifecycle-formatter.js';
