import { check } from 'express-validator';

const labPair = [
  check('labAId').isString().trim().notEmpty().withMessage('labAId parameter is required'),
  check('labBId').isString().trim().notEmpty().withMessage('labBId parameter is required'),
];

export { labPair };
