export { runWithConcurrency } from './promise_pool';
