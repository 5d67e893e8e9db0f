// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import validator from 'validator';

/**
 * Checks a raw string value.
 *
 * @returns the reason the value is rejected, or undefined when it is valid
 */
export type FieldValidator = (value: string) => string | undefined;

const FILE_UNSAFE_CHARACTERS = /["\\\r\n]/;
const DNS_1123_LABEL = /^[a-z0-9]([-a-z0-9]{0,61}[a-z0-9])?$/;
const DNS_1123_SUBDOMAIN = /^[a-z0-9]([-a-z0-9.]{0,251}[a-z0-9])?$/;
const IDENTIFIER = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,62}$/;
const INTERFACE_NAME = /^[A-Za-z0-9_.:-]{1,15}$/;
const MCC = /^\d{3}$/;
const MNC = /^\d{2,3}$/;

export function isValidIpv4(value: string): boolean {
  return validator.isIP(value, 4);
}

export function isValidEmail(value: string): boolean {
  return validator.isEmail(value);
}

/** True when the value can be stored between double quotes of a `KEY="value"` line. */
export function isFileSafe(value: string): boolean {
  return !FILE_UNSAFE_CHARACTERS.test(value);
}

function check(predicate: (value: string) => boolean, reason: string): FieldValidator {
  return value => (predicate(value) ? undefined : reason);
}

export const Validators = {
  ipv4: check(isValidIpv4, 'must be an IPv4 address in dotted-quad form, e.g. 10.0.0.5'),

  email: check(isValidEmail, 'must be an email address, e.g. admin@example.com'),

  hostName: check(
    value => validator.isFQDN(value, {require_tld: false, allow_underscores: false}),
    'must be a host name, e.g. magma.local',
  ),

  port: check(value => validator.isInt(value, {min: 1, max: 65_535}), 'must be a port number between 1 and 65535'),

  tac: check(value => validator.isInt(value, {min: 1, max: 65_535}), 'must be an integer between 1 and 65535'),

  mcc: check(value => MCC.test(value), 'must be a 3 digit mobile country code'),

  mnc: check(value => MNC.test(value), 'must be a 2 or 3 digit mobile network code'),

  namespace: check(value => DNS_1123_LABEL.test(value), 'must be a DNS-1123 label, e.g. magma'),

  storageClass: check(value => DNS_1123_SUBDOMAIN.test(value), 'must be a DNS-1123 subdomain, e.g. standard'),

  identifier: check(
    value => IDENTIFIER.test(value),
    'may only contain letters, digits, underscores, dots and dashes (at most 63 characters)',
  ),

  interfaceName: check(value => INTERFACE_NAME.test(value), 'must be a network interface name, e.g. eth0'),

  identifierList: (value: string): string | undefined => {
    const items = splitList(value);
    if (items.length === 0) {
      return 'must contain at least one entry';
    }
    const invalid = items.find(item => !IDENTIFIER.test(item));
    if (invalid !== undefined) {
      return `entry '${invalid}' may only contain letters, digits, underscores, dots and dashes`;
    }
    return new Set(items).size === items.length ? undefined : 'must not contain duplicate entries';
  },

  secret: check(value => value.length > 0, 'must not be empty'),

  absolutePath: check(value => path.isAbsolute(value), 'must be an absolute path'),
};

/** Splits a comma separated list, trimming entries and dropping empty ones. */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Runs the field validator after the checks every persisted value must pass.
 *
 * @returns the rejection reason, or undefined when the value is valid
 */
export function validateValue(value: string, fieldValidator: FieldValidator): string | undefined {
  if (value.trim().length === 0) {
    return 'is required';
  }
  if (!isFileSafe(value)) {
    return 'must not contain double quotes, backslashes or line breaks';
  }
  return fieldValidator(value);
}
