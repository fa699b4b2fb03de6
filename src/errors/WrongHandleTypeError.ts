export class WrongHandleTypeError extends Error {}
