export const DEFAULT_SERVICE_NAME = 'mini-crm'

export const DEFAULT_PHONE_COUNTRY = 'VE'

export const AUDIT_LOG_MAX_PAGE_SIZE = 500
