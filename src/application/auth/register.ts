import { EmptyCredentialError } from '../../domain/auth/errors.js';
import type { PasswordHasher } from '../../domain/auth/password.js';
import type { UserIdentity } from '../../domain/auth/user.js';
import { Deadline } from '../deadline.js';
import type { EventNotifier, UserStore } from '../ports.js';
import { callStore } from './storeCall.js';

export const USER_REGISTERED_TOPIC = 'user.registered';

export interface RegisterCommand {
  username: string;
  email: string;
  password: string;
  role: string;
}

export class RegisterUseCase {
  constructor(
    private userStore: UserStore,
    private hasher: PasswordHasher,
    private notifier: EventNotifier
  ) {}

  async execute(
    command: RegisterCommand,
    deadline: Deadline = Deadline.none()
  ): Promise<UserIdentity> {
    if (command.password.length === 0) {
      throw new EmptyCredentialError();
    }

    const passwordHash = await this.hasher.hash(command.password);

    // Unique email is enforced by the store; DuplicateEmailError passes through
    const user = await callStore(
      'createUser',
      this.userStore.createUser(
        {
          username: command.username,
          email: command.email,
          role: command.role,
        },
        passwordHash
      ),
      deadline
    );

    // Detached: the registration stands whatever happens to the event
    this.notifier.dispatch(USER_REGISTERED_TOPIC, {
      id: user.id,
      email: user.email,
    });

    return user;
  }
}
