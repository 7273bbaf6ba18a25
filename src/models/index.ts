export { default as Feedback } from './Feedback';
export { default as Counter } from './Counter';
