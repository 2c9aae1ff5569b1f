import { body, check } from 'express-validator';
import { ROLES } from '../../types/permissions';

const getById = [
  check('organizationId')
    .exists().withMessage('organizationId parameter is required')
    .isUUID().withMessage('organizationId must be a valid UUID'),
];

const create = [
  body('name')
    .exists().withMessage('Organization name is required')
    .isString().withMessage('Organization name must be a string')
    .trim()
    .isLength({ min: 3, max: 100 }).withMessage('Organization name must be between 3 and 100 characters long'),
  body('description')
    .optional({ values: 'null' })
    .isString().withMessage('Description must be a string'),
];

const member = [
  ...getById,
  check('userId')
    .exists().withMessage('userId parameter is required')
    .isUUID().withMessage('userId must be a valid UUID'),
];

const updateMemberRole = [
  ...member,
  body('role')
    .exists().withMessage('Member role is required')
    .isIn([...ROLES]).withMessage(`Member role must be one of ${ROLES.join(', ')}`),
];

const createInvitation = [
  ...getById,
  body('email')
    .exists().withMessage('Invitee email is required')
    .isString().withMessage('Invitee email must be a string')
    .trim()
    .isEmail().withMessage('Invitee email must be a valid email address'),
  body('role')
    .optional()
    .isIn([...ROLES]).withMessage(`Invitation role must be one of ${ROLES.join(', ')}`),
];

export { create, getById, member, updateMemberRole, createInvitation };
