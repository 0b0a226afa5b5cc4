export {
  toCompanySimple,
  toCompanyFull,
  toEmployeeSimple,
  toEmployeeFull,
} from './shapes.js';
