export const $base = 'http://www.w3.org/2001/XMLSchema#';

export const string = `${$base}string`;
export const integer = `${$base}integer`;
