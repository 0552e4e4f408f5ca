/**
 * 現在時刻を提供するポート
 */
export interface Clock {
  now(): Date;
}
