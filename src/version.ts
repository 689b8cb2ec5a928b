export const SERVER_NAME = 'hr-leave-mcp';
export const SERVER_VERSION = '0.1.0';
