export const TRANSFER_GATEWAY = "TRANSFER_GATEWAY";
