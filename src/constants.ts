export const LVM_INFO = 'lvm_info' as const;
export const LVM_READ_FILE = 'lvm_read_file' as const;
export const LVM_GET_SEGMENT = 'lvm_get_segment' as const;
export const LVM_PARSE_TEXT = 'lvm_parse_text' as const;

export type LvmToolName =
  | typeof LVM_INFO
  | typeof LVM_READ_FILE
  | typeof LVM_GET_SEGMENT
  | typeof LVM_PARSE_TEXT;
