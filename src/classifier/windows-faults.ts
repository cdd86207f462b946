/**
 * Windows structured exception codes that indicate a crash rather than an
 * ordinary exit status.
 */

export const WINDOWS_FAULTS: Readonly<Record<number, string>> = Object.freeze({
  0x80000002: 'EXCEPTION_DATATYPE_MISALIGNMENT',
  0x80000003: 'EXCEPTION_BREAKPOINT',
  0xc0000005: 'EXCEPTION_ACCESS_VIOLATION',
  0xc0000006: 'EXCEPTION_IN_PAGE_ERROR',
  0xc000001d: 'EXCEPTION_ILLEGAL_INSTRUCTION',
  0xc000008c: 'EXCEPTION_ARRAY_BOUNDS_EXCEEDED',
  0xc000008d: 'EXCEPTION_FLT_DENORMAL_OPERAND',
  0xc000008e: 'EXCEPTION_FLT_DIVIDE_BY_ZERO',
  0xc0000090: 'EXCEPTION_FLT_INVALID_OPERATION',
  0xc0000094: 'EXCEPTION_INT_DIVIDE_BY_ZERO',
  0xc0000095: 'EXCEPTION_INT_OVERFLOW',
  0xc0000096: 'EXCEPTION_PRIV_INSTRUCTION',
  0xc00000fd: 'EXCEPTION_STACK_OVERFLOW',
  0xc0000374: 'STATUS_HEAP_CORRUPTION',
  0xc0000409: 'STATUS_STACK_BUFFER_OVERRUN',
});

/**
 * Normalize a Windows exit status to its unsigned 32-bit value.
 * Some callers report NTSTATUS codes as negative int32.
 */
export function toUnsigned32(code: number): number {
  return code >>> 0;
}

export function lookupWindowsFault(code: number): string | undefined {
  return WINDOWS_FAULTS[toUnsigned32(code)];
}

export function formatHex(code: number): string {
  return `0x${toUnsigned32(code).toString(16).padStart(8, '0')}`;
}
