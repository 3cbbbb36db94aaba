export { ROLES, isRole, type Role } from './role.js';
export { Message, substitute, type MessageInit, type Usage, type Variables } from './message.js';
export { Template } from './template.js';
