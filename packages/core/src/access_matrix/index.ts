export { AccessMatrix, accessKey } from './access_matrix';
