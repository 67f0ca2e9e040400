export {
  convertWei,
  weiToEth,
  weiToGwei,
  ETHER_DECIMALS,
  GWEI_DECIMALS,
  type WeiAmount,
} from './unit-conversion.js';
