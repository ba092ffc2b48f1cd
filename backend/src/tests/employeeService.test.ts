import { createEmployee, listEmployees, updateEmployee } from '../services/employeeService';
import { createOrder } from '../services/serviceOrderService';
import { today } from '../utils/dates';
import { freshDb, seedClientWithVehicle, seedTenant } from './__mocks__/fixtures';

describe('employeeService', () => {
  test('joining date defaults to today and accepts dd/mm/yyyy', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);

    const first = createEmployee(db, actor, { name: 'Carlos' });
    if (first.ok) expect(first.data).toMatchObject({ joinedOn: today(), active: true });
    const dated = createEmployee(db, actor, { name: 'Bia', joinedOn: '05/02/2023', active: 'false' });
    if (dated.ok) expect(dated.data).toMatchObject({ joinedOn: '2023-02-05', active: false });
    expect([first.ok, dated.ok]).toEqual([true, true]);

    const bad = createEmployee(db, actor, { name: 'Rui', joinedOn: '2023-13-01' });
    expect(bad.ok).toBe(false);
    if (!bad.ok) expect(bad.error.message).toBe('Data de ingresso inválida.');

    expect(listEmployees(db, actor, {}).items.map((e) => e.name)).toEqual(['Bia', 'Carlos']);
  });

  test('only active employees of the company can execute orders', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);
    const other = seedTenant(db, 'Outra Oficina');
    const { client, vehicle } = seedClientWithVehicle(db, actor);

    const employee = createEmployee(db, actor, { name: 'Carlos' });
    if (!employee.ok) throw new Error(employee.error.message);
    const order = { clientId: client.id, vehicleId: vehicle.id, problem: 'Freio', executorId: employee.data.id };
    expect(createOrder(db, actor, order).ok).toBe(true);

    updateEmployee(db, actor, employee.data.id, { name: 'Carlos', active: false });
    const inactive = createOrder(db, actor, order);
    expect(inactive.ok).toBe(false);
    if (!inactive.ok) expect(inactive.error.message).toBe('Selecione um executor válido.');

    const foreign = updateEmployee(db, other.actor, employee.data.id, { name: 'X' });
    expect(foreign.ok).toBe(false);
    if (!foreign.ok) expect(foreign.error.code).toBe('EMPLOYEE_NOT_FOUND');
  });
});
