import { Store } from "../repositories/types";
import { NewContact, User } from "../types/models";
import { NotFoundError } from "../utils/errors";

export function getProfile(user: User) {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    role: user.role,
    company: user.company,
    position: user.position,
  };
}

export async function listContacts(store: Store, user: User) {
  return store.contacts.listByUser(user.id);
}

export async function addContact(
  store: Store,
  user: User,
  input: Omit<NewContact, "userId">
) {
  return store.contacts.create({ ...input, userId: user.id });
}

export async function deleteContact(store: Store, user: User, contactId: number) {
  const deleted = await store.contacts.delete(contactId, user.id);
  if (!deleted) {
    throw new NotFoundError("Contact not found");
  }
}
