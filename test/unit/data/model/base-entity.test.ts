// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';
import {BaseEntity} from '../../../../src/data/model/base-entity.js';
import {BaseResource} from '../../../../src/data/model/base-resource.js';
import {WrongEntityTypeError} from '../../../../src/data/mapper/api/wrong-entity-type-error.js';
import {
  ArchivedOrderEntity,
  CustomerEntity,
  CustomerEntityProxy,
  ItemEntity,
  OrderEntity,
} from '../../fixtures/order-entities.fixture.js';
import {OrderResource} from '../../fixtures/order-resources.fixture.js';
import {createOrderMapping, type OrderMappingFixture} from '../../fixtures/order-mapping.fixture.js';

describe('BaseEntity', () => {
  let fixture: OrderMappingFixture;

  beforeEach(() => {
    fixture = createOrderMapping();
    fixture.classMapper.registerMapping(OrderResource, ArchivedOrderEntity, ArchivedOrderEntity);
  });

  it('should create an entity of the called class', async () => {
    const resource: OrderResource = OrderResource.createFromNormalizedMap({total: 30});

    const order: OrderEntity = await OrderEntity.create(resource, fixture.mapper);
    const archived: ArchivedOrderEntity = await ArchivedOrderEntity.create(resource, fixture.mapper);

    expect(order.constructor).to.equal(OrderEntity);
    expect(order.total).to.equal(30);
    expect(archived.constructor).to.equal(ArchivedOrderEntity);
    expect(archived.total).to.equal(30);
  });

  it('should update the given entity', async () => {
    const existing: OrderEntity = new OrderEntity();
    existing.total = 1;

    const order: OrderEntity = await OrderEntity.create(
      OrderResource.createFromNormalizedMap({total: 2}),
      fixture.mapper,
      existing,
    );

    expect(order).to.equal(existing);
    expect(existing.total).to.equal(2);
  });

  it('should reject a resource mapped to another entity class', async () => {
    const resource: OrderResource = OrderResource.createFromNormalizedMap({total: 30});

    const error: unknown = await ItemEntity.create(resource, fixture.mapper).catch((rejection: unknown) => rejection);

    expect(error).to.be.instanceOf(WrongEntityTypeError);
    expect(error).to.include({message: 'Wrong type (OrderEntity instead of ItemEntity) in entity factory'});
    expect(error).to.have.property('meta').that.deep.equals({expected: 'ItemEntity', found: 'OrderEntity'});
  });

  it('should set timestamps in the lifecycle hooks', () => {
    const order: OrderEntity = new OrderEntity();

    order.onPrePersist();
    const createdAt: Date | null = order.getCreatedAt();
    expect(createdAt).to.be.instanceOf(Date);
    expect(order.getUpdatedAt()).to.equal(createdAt);

    order.onPreUpdate();
    expect(order.getCreatedAt()).to.equal(createdAt);
    expect(order.getUpdatedAt()).to.not.equal(createdAt);
  });

  it('should resolve the proxied class of a proxy', () => {
    expect(BaseEntity.classOf(new CustomerEntityProxy(() => true))).to.equal(CustomerEntity);
    expect(BaseEntity.classOf(new OrderEntity())).to.equal(OrderEntity);
    expect(BaseEntity.isEntityClass(OrderEntity)).to.be.true;
    expect(BaseEntity.isEntityClass(OrderResource)).to.be.false;
  });
});

describe('BaseResource', () => {
  it('should create a resource from an entity', () => {
    const order: OrderEntity = new OrderEntity();
    order.id = 9;
    order.total = 12;

    const resource: OrderResource = OrderResource.createFromEntity(order, createOrderMapping().normalizer);

    expect(resource).to.be.instanceOf(OrderResource);
    expect(resource).to.include({id: 9, total: 12, status: 'new'});
    expect(resource.items).to.deep.equal([]);
  });

  it('should convert dates of a normalized map', () => {
    const resource: OrderResource = OrderResource.createFromNormalizedMap({shippedAt: '2024-03-01T12:00:00+00:00'});

    expect(resource.shippedAt).to.be.instanceOf(Date);
    expect(resource.shippedAt?.toISOString()).to.equal('2024-03-01T12:00:00.000Z');
  });

  it('should recognise resource classes', () => {
    expect(BaseResource.isResourceClass(OrderResource)).to.be.true;
    expect(BaseResource.isResourceClass(BaseResource)).to.be.true;
    expect(BaseResource.isResourceClass(OrderEntity)).to.be.false;
  });
});
