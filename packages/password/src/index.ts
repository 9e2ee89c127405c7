export {
  PasswordHasher,
  parsePasswordRecord,
  type PasswordHasherOptions,
  type PasswordRecord,
} from "./PasswordHasher";
