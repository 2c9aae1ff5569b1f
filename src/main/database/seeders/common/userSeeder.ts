import container from '../../../config/container';
import { ConflictError } from '../../../utils/errors';

/**
 * Creates a default administrator, together with the organization that
 * registration gives every user, unless that account already exists.
 */
export const seedDefaultAdmin = async () => {
  const logger = container.resolve('logger');
  const userRepository = container.resolve('userRepository');
  const userService = container.resolve('userService');

  const email = process.env.ADMIN_EMAIL ?? 'admin@example.org';
  const password = process.env.ADMIN_PASSWORD ?? 'change-me-please';
  const name = process.env.ADMIN_NAME ?? 'Administrator';

  if (await userRepository.findByEmail(email)) {
    logger.info({ email }, 'Default admin already exists, skipping');
    return;
  }

  try {
    const session = await userService.register({ email, name, password });
    logger.info({ email, organizationId: session.organizationId }, 'Default admin created');
  } catch (err) {
    if (err instanceof ConflictError) {
      logger.info({ email }, 'Default admin already exists, skipping');
      return;
    }
    throw err;
  }
};
