export * from "@/types/annotation";
export * from "@/lib/annotationCodec";
export * from "@/lib/boxGeometry";
export * from "@/lib/classRegistry";
export * from "@/lib/coordinates";
export * from "@/lib/hitTest";
export * from "@/lib/logger";
export * from "@/lib/settings";
export * from "@/lib/undoStack";
export * from "@/store/editorStore";
export * from "@/services/annotationStorage";
export * from "@/services/annotationSession";
