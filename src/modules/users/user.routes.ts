import { Router } from 'express'
import { validate } from '../../lib/validation.js'
import { requireRole } from '../../middleware/rbac.js'
import * as userController from './user.controller.js'
import { UserRole } from './user.entity.js'
import {
  createUserSchema,
  listUsersQuerySchema,
  updateUserSchema,
  userIdParamSchema,
} from './user.schema.js'

const router = Router()

// User management is admin only
router.use(requireRole(UserRole.ADMIN))

// List users
router.get('/', validate({ query: listUsersQuerySchema }), userController.listUsers)

// Create user
router.post('/', validate({ body: createUserSchema }), userController.createUser)

// Get single user
router.get('/:id', validate({ params: userIdParamSchema }), userController.getUser)

// Partial update
router.patch(
  '/:id',
  validate({
    params: userIdParamSchema,
    body: updateUserSchema,
  }),
  userController.updateUser
)

// Delete user (not yourself)
router.delete('/:id', validate({ params: userIdParamSchema }), userController.deleteUser)

export default router
