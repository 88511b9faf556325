export const CONTACTS_DEFAULT_PAGE_SIZE = 10;
export const CONTACTS_MAX_PAGE_SIZE = 500;

export const BIRTHDAY_WINDOW_DAYS = 7;
// Upper bound for the ?days= query on birthday lookups
export const BIRTHDAY_WINDOW_MAX_DAYS = 366;
