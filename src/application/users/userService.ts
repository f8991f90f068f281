import { UserView, toUserView } from '../../domain/users/user.js';
import type { User } from '../../domain/users/user.js';
import { NotFoundError } from '../errors.js';
import { toPage } from '../paging.js';
import type { UnitOfWork } from '../persistence/unitOfWork.js';
import type { GetAllUsersRequest, UpdateUserRequest } from './requests.js';

const DEFAULT_USERS_PER_PAGE = 10;

export class UserService {
  constructor(private readonly uow: UnitOfWork) {}

  async list(request: GetAllUsersRequest): Promise<UserView[]> {
    const users = await this.uow.reader.listUsers({
      ...toPage(request, DEFAULT_USERS_PER_PAGE),
      emailContains: request.emailContains,
      firstNameContains: request.firstNameContains,
      lastNameContains: request.lastNameContains,
      isActive: request.isActive,
    });
    return users.map(toUserView);
  }

  async get(id: string): Promise<UserView> {
    return toUserView(await this.load(id));
  }

  /** Overwrites the editable profile fields. Used for both admin edits and self-service. */
  async update(id: string, request: UpdateUserRequest): Promise<UserView> {
    const user = this.uow.track('user', await this.load(id));
    user.firstName = request.firstName ?? null;
    user.lastName = request.lastName ?? null;
    user.profilePicture = request.profilePicture || null;
    await this.uow.commit();
    return toUserView(user);
  }

  async deactivate(id: string): Promise<UserView> {
    const user = this.uow.track('user', await this.load(id));
    user.isActive = false;
    await this.uow.commit();
    return toUserView(user);
  }

  private async load(id: string): Promise<User> {
    const user = await this.uow.reader.findUser(id);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return user;
  }
}
