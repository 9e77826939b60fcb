export const ServerMessages = {
  SERVER_STARTED: 'Gateway started on port %d',
  SERVER_STOPPED: 'Gateway has been stopped',
  PORT_ALREADY_USED: 'Port %d is already in use',
  PORT_INVALID: 'Port %d is invalid or access is denied',
  HOSTNAME_UNAVAILABLE: 'Hostname %s is unavailable',
  HOSTNAME_UNKNOWN: 'Hostname %s is unknown',
  UNKNOWN_SERVER_ERROR: 'Server error: %s',
  PROXY_ERROR: 'Error while proxying to %s: %s',
  PROXY_TIMEOUT: 'Backend %s did not answer within %d ms',
  MOCK_RENDER_ERROR: 'Error while rendering mock %s: %s',
  REQUEST_HANDLING_ERROR: 'Error while handling request: %s',
  NOT_FOUND: 'Not found: %s %s',
  BACKEND_UNREACHABLE: 'Backend unreachable: %s',
  BACKEND_TIMEOUT: 'Backend timeout: %s',
  CONFIG_RELOADED: 'Configuration %s loaded from %s (revision %d, %d routes, %d mocks)',
  CONFIG_RELOAD_REJECTED: 'Configuration from %s rejected, previous tables stay active'
} as const;
