export const TOOL_NAME = 'yang-primary-keys';
export const VERSION = '0.1.0';
