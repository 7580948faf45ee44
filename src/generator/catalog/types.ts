/**
 * Type catalog model
 */

export interface AvailableType {
  name: string;
  namespace?: string;
  isNative: boolean;
}

export interface ObsoleteInfo {
  present: boolean;
  message?: string;
}

export interface NativeParameter {
  name: string;
  type: string;
  isOptional: boolean;
  isRest: boolean;
}

export interface NativeTypeParameter {
  name: string;
  constraint?: string;
}

interface NativeMemberBase {
  name: string;
  /** Stub type that declares the member. */
  declaringType: string;
  obsolete: ObsoleteInfo;
}

export interface NativeProperty extends NativeMemberBase {
  kind: "property";
  type: string;
  hasGetter: boolean;
  hasSetter: boolean;
}

export interface NativeEvent extends NativeMemberBase {
  kind: "event";
  handlerType: string;
  hasAdd: boolean;
  hasRemove: boolean;
}

export interface NativeMethod extends NativeMemberBase {
  kind: "method";
  typeParameters: NativeTypeParameter[];
  parameters: NativeParameter[];
  returnType: string;
}

export type NativeMember = NativeProperty | NativeEvent | NativeMethod;

export interface NativeTypeInfo {
  name: string;
  baseName?: string;
  /** Own members in declaration order. */
  members: NativeMember[];
  sourcePath: string;
}

export const ENGINE_NAMESPACE = "Godot";
