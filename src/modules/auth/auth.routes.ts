import { Router } from 'express'
import { validate } from '../../lib/validation.js'
import { populateUserContext, requireAuthentication } from '../../middleware/auth.js'
import * as authController from './auth.controller.js'
import { loginSchema } from './auth.schema.js'

const router = Router()

// JSON or form-encoded credentials
router.post('/login', validate({ body: loginSchema }), authController.login)

// Current user
router.get('/me', requireAuthentication, populateUserContext, authController.me)

export default router
