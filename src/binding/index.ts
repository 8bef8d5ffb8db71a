export { BindingTable } from './table.js';
