/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { parseCompareRequest, parseUrlCompareRequest, parseBatchRequest } from './request';
export { toWireDiff, toCompareResponse, toBatchResponse } from './response';
export type {
  WireDiff,
  WireCompareResponse,
  WireBatchFailure,
  WireBatchResponse,
} from './types';
