import { body } from 'express-validator';

const register = [
  body('email')
    .exists().withMessage('Email is required')
    .isString().withMessage('Email must be a string')
    .trim()
    .isEmail().withMessage('Email must be a valid email address'),
  body('name')
    .exists().withMessage('Name is required')
    .isString().withMessage('Name must be a string')
    .trim()
    .notEmpty().withMessage('Name cannot be empty')
    .isLength({ max: 100 }).withMessage('Name must be at most 100 characters long'),
  body('password')
    .exists().withMessage('Password is required')
    .isString().withMessage('Password must be a string')
    .isLength({ min: 8 }).withMessage('Password must be at least 8 characters long'),
];

const login = [
  body('email')
    .exists().withMessage('Email is required')
    .isString().withMessage('Email must be a string'),
  body('password')
    .exists().withMessage('Password is required')
    .isString().withMessage('Password must be a string'),
];

const switchOrganization = [
  body('organizationId')
    .exists().withMessage('organizationId is required')
    .isString().withMessage('organizationId must be a string')
    .notEmpty().withMessage('organizationId cannot be empty'),
];

export { register, login, switchOrganization };
