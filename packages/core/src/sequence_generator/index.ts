export { SequenceGenerator } from './sequence_generator';
