import { createUser, deactivateUser, listUsers, updateUser } from '../services/userService';
import { freshDb, seedTenant } from './__mocks__/fixtures';

const newUser = (username: string, extra: Record<string, unknown> = {}) => ({
  username,
  password1: 'segura-123',
  password2: 'segura-123',
  ...extra
});

describe('userService: seat limits', () => {
  test('BASICO allows six active users; the seventh is refused', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);

    for (let i = 1; i <= 5; i++) {
      expect(createUser(db, actor, newUser(`func${i}`)).ok).toBe(true);
    }
    const seventh = createUser(db, actor, newUser('func6'));
    expect(seventh.ok).toBe(false);
    if (!seventh.ok) {
      expect(seventh.error.code).toBe('USER_LIMIT_REACHED');
      expect(seventh.error.message).toBe(
        'Limite de usuarios ativos atingido. Considere o plano PLUS para aumentar o limite.'
      );
    }

    // inactive users take no seat
    expect(createUser(db, actor, newUser('reserva', { isActive: false })).ok).toBe(true);
  });

  test('isManager is ignored outside PLUS', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);
    const result = createUser(db, actor, newUser('ana', { isManager: true }));
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.data.isManager).toBe(false);
  });

  test('editing a BASICO manager keeps the manager flag', () => {
    const db = freshDb();
    const { actor, manager } = seedTenant(db);

    const edited = updateUser(db, actor, manager.id, { username: manager.username, firstName: 'Ana', isManager: false });
    expect(edited.ok).toBe(true);
    if (edited.ok) {
      expect(edited.data.firstName).toBe('Ana');
      expect(edited.data.isManager).toBe(true);
    }
    expect(listUsers(db, actor, {}).usage.activeManagers).toBe(1);
  });

  test('PLUS allows three managers', () => {
    const db = freshDb();
    const { actor } = seedTenant(db, 'Oficina Plus', 'PLUS');

    expect(createUser(db, actor, newUser('g2', { isManager: true })).ok).toBe(true);
    expect(createUser(db, actor, newUser('g3', { isManager: 'on' })).ok).toBe(true);
    const fourth = createUser(db, actor, newUser('g4', { isManager: true }));
    expect(fourth.ok).toBe(false);
    if (!fourth.ok) expect(fourth.error.code).toBe('MANAGER_LIMIT_REACHED');

    const usage = listUsers(db, actor, {}).usage;
    expect(usage).toEqual({ userLimit: 30, managerLimit: 3, activeUsers: 3, activeManagers: 3 });
  });

  test('reactivating a user needs a free seat', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);
    const created = createUser(db, actor, newUser('volta'));
    if (!created.ok) throw new Error('create failed');
    expect(deactivateUser(db, actor, created.data.id).ok).toBe(true);

    for (let i = 1; i <= 5; i++) createUser(db, actor, newUser(`func${i}`));
    const reactivated = updateUser(db, actor, created.data.id, { username: 'volta', isActive: true });
    expect(reactivated.ok).toBe(false);
    if (!reactivated.ok) expect(reactivated.error.code).toBe('USER_LIMIT_REACHED');

    // editing an already active user does not count again
    const list = listUsers(db, actor, { q: 'func1' });
    expect(list.items).toHaveLength(1);
    expect(updateUser(db, actor, list.items[0].id, { username: 'func1', firstName: 'Ana' }).ok).toBe(true);
  });
});

describe('userService: edits', () => {
  test('password is optional on update but must come in pairs', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);
    const created = createUser(db, actor, newUser('bruno'));
    if (!created.ok) throw new Error('create failed');

    const half = updateUser(db, actor, created.data.id, { username: 'bruno', password1: 'nova-senha-1' });
    expect(half.ok).toBe(false);
    if (!half.ok) expect(half.error.message).toBe('Informe a senha duas vezes.');

    const renamed = updateUser(db, actor, created.data.id, { username: 'bruno.s', email: 'bruno@example.test' });
    expect(renamed.ok).toBe(true);
    if (renamed.ok) expect(renamed.data).toMatchObject({ username: 'bruno.s', email: 'bruno@example.test' });
  });

  test('logins are unique across companies, case-insensitively', () => {
    const db = freshDb();
    const first = seedTenant(db, 'Oficina 1');
    const second = seedTenant(db, 'Oficina 2');
    expect(createUser(db, first.actor, newUser('carla')).ok).toBe(true);

    const clash = createUser(db, second.actor, newUser('CARLA'));
    expect(clash.ok).toBe(false);
    if (!clash.ok) expect(clash.error.code).toBe('DUPLICATE_USERNAME');
  });

  test('deactivate refuses the caller and other companies', () => {
    const db = freshDb();
    const first = seedTenant(db, 'Oficina 1');
    const second = seedTenant(db, 'Oficina 2');

    const self = deactivateUser(db, first.actor, first.manager.id);
    expect(self.ok).toBe(false);
    if (!self.ok) {
      expect(self.error.code).toBe('CANNOT_DEACTIVATE_SELF');
      expect(self.error.message).toBe('Nao e possivel desativar o proprio usuario.');
    }

    const viaUpdate = updateUser(db, first.actor, first.manager.id, {
      username: first.manager.username,
      isActive: false
    });
    expect(viaUpdate.ok).toBe(false);
    if (!viaUpdate.ok) {
      expect(viaUpdate.error.code).toBe('CANNOT_DEACTIVATE_SELF');
      expect(viaUpdate.error.message).toBe('Nao e possivel desativar o proprio usuario.');
    }

    const foreign = deactivateUser(db, first.actor, second.manager.id);
    expect(foreign.ok).toBe(false);
    if (!foreign.ok) expect(foreign.error.code).toBe('FORBIDDEN');

    const foreignEdit = updateUser(db, first.actor, second.manager.id, { username: 'x' });
    expect(foreignEdit.ok).toBe(false);
    if (!foreignEdit.ok) expect(foreignEdit.error.code).toBe('USER_NOT_FOUND');
  });

  test('list searches and orders by login', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);
    createUser(db, actor, newUser('zeca', { firstName: 'José' }));
    createUser(db, actor, newUser('beto', { lastName: 'Josefino' }));

    const found = listUsers(db, actor, { q: 'jos' });
    expect(found.items.map((u) => u.username)).toEqual(['beto', 'zeca']);
    expect(found.total).toBe(2);
  });
});
