/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { flattenXml } from './xml-flattener';
export { validateXmlContent, validateUrl } from './validation';
export { elementAt } from './types';
export type { XmlElement, FlatDocument } from './types';
