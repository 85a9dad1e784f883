export const ErrorCode = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_PROFILE_INVALID: 'CONFIG_PROFILE_INVALID',
  CONFIG_HOST_LIST_EMPTY: 'CONFIG_HOST_LIST_EMPTY',

  // Version parsing / comparison
  MALFORMED_VERSION: 'MALFORMED_VERSION',

  // Host probe (informational, recorded as warnings)
  PRODUCT_NOT_INSTALLED: 'PRODUCT_NOT_INSTALLED',
  INSTALL_AMBIGUOUS: 'INSTALL_AMBIGUOUS',
  SUB_SOURCE_READ_FAILED: 'SUB_SOURCE_READ_FAILED',

  // Fleet dispatch
  HOST_UNREACHABLE: 'HOST_UNREACHABLE',
  TRANSPORT_NETWORK_ERROR: 'TRANSPORT_NETWORK_ERROR',
  TRANSPORT_TIMEOUT: 'TRANSPORT_TIMEOUT',
  TRANSPORT_AUTH_FAILED: 'TRANSPORT_AUTH_FAILED',
  TRANSPORT_PERMISSION_DENIED: 'TRANSPORT_PERMISSION_DENIED',
  TRANSPORT_BAD_RESPONSE: 'TRANSPORT_BAD_RESPONSE',
  TRANSPORT_CONFIG_INVALID: 'TRANSPORT_CONFIG_INVALID',
  TRANSPORT_EXEC_FAILED: 'TRANSPORT_EXEC_FAILED',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];
