import { Router } from 'express'
import { validate } from '../../lib/validation.js'
import { requireActiveUser } from '../../middleware/rbac.js'
import * as clientController from './client.controller.js'
import {
  advancedSearchQuerySchema,
  checkExistsQuerySchema,
  clientIdParamSchema,
  clientPhoneParamSchema,
  createClientSchema,
  listClientsQuerySchema,
  searchClientsQuerySchema,
  updateClientSchema,
} from './client.schema.js'

const router = Router()

router.use(requireActiveUser)

// List clients
router.get('/', validate({ query: listClientsQuerySchema }), clientController.listClients)

// Create client
router.post('/', validate({ body: createClientSchema }), clientController.createClient)

// Search by contact or company name
router.get('/search', validate({ query: searchClientsQuerySchema }), clientController.searchClients)

// Multi-field search
router.get(
  '/advanced-search',
  validate({ query: advancedSearchQuerySchema }),
  clientController.advancedSearchClients
)

// Existence check by phone, email or instagram
router.get('/check-exists', validate({ query: checkExistsQuerySchema }), clientController.checkClientExists)

// Lookup by phone
router.get('/by-phone/:phone', validate({ params: clientPhoneParamSchema }), clientController.getClientByPhone)

// Get single client with its leads
router.get('/:id', validate({ params: clientIdParamSchema }), clientController.getClient)

// Partial update
router.patch(
  '/:id',
  validate({
    params: clientIdParamSchema,
    body: updateClientSchema,
  }),
  clientController.updateClient
)

// Delete client
router.delete('/:id', validate({ params: clientIdParamSchema }), clientController.deleteClient)

export default router
