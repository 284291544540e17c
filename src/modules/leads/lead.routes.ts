import { Router } from 'express'
import { validate } from '../../lib/validation.js'
import { requireActiveUser } from '../../middleware/rbac.js'
import * as leadController from './lead.controller.js'
import {
  advancedSearchQuerySchema,
  assignLeadSchema,
  createLeadSchema,
  leadClientParamSchema,
  leadIdParamSchema,
  leadStatusUpdateSchema,
  listLeadsQuerySchema,
  recentLeadsQuerySchema,
  updateLeadSchema,
} from './lead.schema.js'

const router = Router()

router.use(requireActiveUser)

// List leads (status, channel, assignedToId filters)
router.get('/', validate({ query: listLeadsQuerySchema }), leadController.listLeads)

// Create lead
router.post('/', validate({ body: createLeadSchema }), leadController.createLead)

// Counts by status and channel
router.get('/stats', leadController.getLeadStats)

// Created in the last N hours
router.get('/recent', validate({ query: recentLeadsQuerySchema }), leadController.getRecentLeads)

// Multi-field search
router.get('/advanced-search', validate({ query: advancedSearchQuerySchema }), leadController.advancedSearchLeads)

// Leads of one client
router.get('/client/:clientId', validate({ params: leadClientParamSchema }), leadController.getLeadsByClient)

// Get single lead with client, creator and assignee
router.get('/:id', validate({ params: leadIdParamSchema }), leadController.getLead)

// Partial update
router.patch(
  '/:id',
  validate({
    params: leadIdParamSchema,
    body: updateLeadSchema,
  }),
  leadController.updateLead
)

// Status change
router.patch(
  '/:id/status',
  validate({
    params: leadIdParamSchema,
    body: leadStatusUpdateSchema,
  }),
  leadController.updateLeadStatus
)

// Assignment
router.patch(
  '/:id/assign',
  validate({
    params: leadIdParamSchema,
    body: assignLeadSchema,
  }),
  leadController.assignLead
)

// Delete lead
router.delete('/:id', validate({ params: leadIdParamSchema }), leadController.deleteLead)

export default router
