export * from "./payload";
export * from "./qr_image";
export * from "./label_profiles";
export * from "./latex_label";
