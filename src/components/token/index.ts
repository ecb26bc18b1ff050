export { TokenDisplayField, NO_TOKEN_TEXT } from './TokenDisplayField';
export { TestingSteps } from './TestingSteps';
export { PushStatusCard } from './PushStatusCard';
