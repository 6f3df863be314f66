export enum ErrorCode {
  CONSTRUCTION = 'CONSTRUCTION',
  ADDRESS = 'ADDRESS',
  CYCLIC_DEPENDENCY = 'CYCLIC_DEPENDENCY',
  TYPE_CONSTRAINT = 'TYPE_CONSTRAINT',
  REQUIREMENT = 'REQUIREMENT',
  CHOICE_CONSTRAINT = 'CHOICE_CONSTRAINT',
  EVAL = 'EVAL',
  UNDEFINED_NAME = 'UNDEFINED_NAME',
  OVERRIDE_CONFLICT = 'OVERRIDE_CONFLICT',
  RESOLUTION = 'RESOLUTION',
  UNIT_NOT_FOUND = 'UNIT_NOT_FOUND',
}
