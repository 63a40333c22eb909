// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, beforeEach, describe, it} from 'mocha';
import sinon, {type SinonSpy} from 'sinon';
import {type ResourceToEntityMapper} from '../../../../../src/data/mapper/impl/resource-to-entity-mapper.js';
import {type EntityNormalizer} from '../../../../../src/data/mapper/impl/entity-normalizer.js';
import {type InMemoryEntityManager} from '../../../../../src/data/persistence/impl/in-memory-entity-manager.js';
import {type BaseEntity} from '../../../../../src/data/model/base-entity.js';
import {RelatedEntityNotFoundError} from '../../../../../src/data/mapper/api/related-entity-not-found-error.js';
import {ObjectMappingError} from '../../../../../src/data/mapper/api/object-mapping-error.js';
import {
  ArchivedOrderEntity,
  CustomerEntity,
  GiftItemEntity,
  ItemEntity,
  OrderEntity,
  OrderStatus,
} from '../../../fixtures/order-entities.fixture.js';
import {CustomerResource, ItemResource, OrderResource} from '../../../fixtures/order-resources.fixture.js';
import {
  AddressBookEntity,
  AddressBookResource,
  AddressEntity,
} from '../../../fixtures/address-book.fixture.js';
import {createOrderMapping, type OrderMappingFixture} from '../../../fixtures/order-mapping.fixture.js';

describe('ResourceToEntityMapper', () => {
  let fixture: OrderMappingFixture;
  let mapper: ResourceToEntityMapper;
  let normalizer: EntityNormalizer;
  let entityManager: InMemoryEntityManager;
  let customer: CustomerEntity;
  let existingItem: ItemEntity;

  beforeEach(() => {
    fixture = createOrderMapping();
    mapper = fixture.mapper;
    normalizer = fixture.normalizer;
    entityManager = fixture.entityManager;

    customer = new CustomerEntity();
    customer.name = 'Ada';
    entityManager.persist(customer);

    existingItem = new ItemEntity();
    existingItem.sku = 'SKU-EXISTING';
    entityManager.persist(existingItem);
  });

  afterEach(() => sinon.restore());

  describe('creating', () => {
    it('should populate a new entity and resolve relations', async () => {
      const resource: OrderResource = OrderResource.createFromNormalizedMap({
        total: 250,
        status: OrderStatus.SHIPPED,
        shippedAt: '2024-03-01T12:00:00+00:00',
        customer: {id: 1},
        items: [{sku: 'SKU-NEW', quantity: 2}, {id: 1}],
        couponCode: 'SPRING',
      });

      const entity: BaseEntity = await mapper.map(resource);

      expect(entity).to.be.instanceOf(OrderEntity);
      if (!(entity instanceof OrderEntity)) {
        return;
      }
      expect(entity.id).to.be.null;
      expect(entity.total).to.equal(250);
      expect(entity.status).to.equal(OrderStatus.SHIPPED);
      expect(entity.shippedAt?.getTime()).to.equal(Date.UTC(2024, 2, 1, 12, 0, 0));
      expect(entity.customer).to.equal(customer);
      expect(entity.items).to.have.lengthOf(2);
      expect(entity.items[0]).to.be.instanceOf(ItemEntity);
      expect(entity.items[0].id).to.be.null;
      expect(entity.items[0].sku).to.equal('SKU-NEW');
      expect(entity.items[0].quantity).to.equal(2);
      expect(entity.items[0].order).to.equal(entity);
      expect(entity.items[1]).to.equal(existingItem);
    });

    it('should copy incoming dates', async () => {
      const shippedAt: Date = new Date('2024-03-01T12:00:00.000Z');
      const resource: OrderResource = OrderResource.createFromNormalizedMap({shippedAt});

      const entity: BaseEntity = await mapper.map(resource);

      expect(entity).to.be.instanceOf(OrderEntity);
      expect(entity).to.have.property('shippedAt').that.deep.equals(shippedAt);
      expect(entity).to.have.property('shippedAt').that.does.not.equal(shippedAt);
    });

    it('should keep defaults for absent values and never write read-only properties', async () => {
      const resource: OrderResource = OrderResource.createFromNormalizedMap({
        id: 42,
        createdAt: '2020-01-01T00:00:00+00:00',
        total: 10,
      });

      const entity: BaseEntity = await mapper.map(resource);

      expect(entity).to.include({id: null, createdAt: null, total: 10, status: OrderStatus.NEW, customer: null});
    });

    it('should fail for an unknown related identifier', async () => {
      const resource: OrderResource = OrderResource.createFromNormalizedMap({customer: {id: 999}});

      const error: unknown = await mapper.map(resource).catch((rejection: unknown) => rejection);

      expect(error).to.be.instanceOf(RelatedEntityNotFoundError);
      expect(error).to.include({
        message: 'CustomerEntity entity with id 999 not found!',
        entity: 'CustomerEntity',
        id: 999,
      });
    });

    it('should fail for an unknown collection element identifier', async () => {
      const resource: OrderResource = OrderResource.createFromNormalizedMap({items: [{id: 1}, {id: 999}]});

      await expect(mapper.map(resource)).to.be.rejectedWith(
        RelatedEntityNotFoundError,
        'ItemEntity entity with id 999 not found!',
      );
    });

    it('should look collection elements up under the owning resource class', async () => {
      fixture.classMapper.registerMapping(ItemResource, GiftItemEntity, OrderResource);
      const gift: GiftItemEntity = new GiftItemEntity();
      gift.giftMessage = 'Happy birthday';
      entityManager.persist(gift);

      const entity: BaseEntity = await mapper.map(OrderResource.createFromNormalizedMap({items: [{id: 2}]}));

      expect(entity).to.be.instanceOf(OrderEntity);
      if (!(entity instanceof OrderEntity)) {
        return;
      }
      expect(entity.items).to.have.lengthOf(1);
      expect(entity.items[0]).to.equal(gift);
      await expect(
        mapper.map(OrderResource.createFromNormalizedMap({items: [{id: 1}]})),
      ).to.be.rejectedWith(RelatedEntityNotFoundError, 'GiftItemEntity entity with id 1 not found!');
    });

    it('should look a single relation up without a condition', async () => {
      fixture.classMapper.registerMapping(OrderResource, ArchivedOrderEntity, 'archive');
      const order: OrderEntity = entityManager.persist(new OrderEntity());

      const entity: BaseEntity = await mapper.map(
        ItemResource.createFromNormalizedMap({sku: 'SKU-GIFT', order: {id: 1}}),
        {condition: 'archive'},
      );

      expect(entity).to.be.instanceOf(ItemEntity);
      expect(entity).to.have.property('order').that.equals(order);
    });

    it('should map a cyclic resource graph onto a cyclic entity graph', async () => {
      const customerResource: CustomerResource = CustomerResource.createFromNormalizedMap({name: 'Grace'});
      const orderResource: OrderResource = OrderResource.createFromNormalizedMap({total: 10});
      orderResource.customer = customerResource;
      customerResource.orders = [orderResource];

      const entity: BaseEntity = await mapper.map(customerResource);

      expect(entity).to.be.instanceOf(CustomerEntity);
      if (!(entity instanceof CustomerEntity)) {
        return;
      }
      expect(entity.name).to.equal('Grace');
      expect(entity.orders).to.have.lengthOf(1);
      expect(entity.orders[0].total).to.equal(10);
      expect(entity.orders[0].customer).to.equal(entity);
    });
  });

  describe('updating', () => {
    let order: OrderEntity;
    let secondItem: ItemEntity;
    let snapshot: OrderResource;

    beforeEach(() => {
      secondItem = new ItemEntity();
      secondItem.sku = 'SKU-2';
      entityManager.persist(secondItem);

      order = new OrderEntity();
      order.total = 100;
      order.status = OrderStatus.SHIPPED;
      order.shippedAt = new Date('2024-03-01T12:00:00.500Z');
      order.setCustomer(customer);
      order.addItem(existingItem);
      order.addItem(secondItem);
      entityManager.persist(order);

      snapshot = OrderResource.createFromEntity(order, normalizer);
    });

    it('should not invoke any mutator when re-applying a normalized snapshot', async () => {
      const shippedAt: Date | null = order.shippedAt;
      const setTotal: SinonSpy = sinon.spy(order, 'setTotal');
      const setCustomer: SinonSpy = sinon.spy(order, 'setCustomer');
      const addItem: SinonSpy = sinon.spy(order, 'addItem');
      const removeItem: SinonSpy = sinon.spy(order, 'removeItem');

      const entity: BaseEntity = await mapper.map(snapshot, {}, order);

      expect(entity).to.equal(order);
      expect(setTotal).to.not.have.been.called;
      expect(setCustomer).to.not.have.been.called;
      expect(addItem).to.not.have.been.called;
      expect(removeItem).to.not.have.been.called;
      expect(order.shippedAt).to.equal(shippedAt);
      expect(order.items).to.deep.equal([existingItem, secondItem]);
    });

    it('should only write the properties that changed', async () => {
      const setTotal: SinonSpy = sinon.spy(order, 'setTotal');
      const setCustomer: SinonSpy = sinon.spy(order, 'setCustomer');
      snapshot.total = 150;

      await mapper.map(snapshot, {}, order);

      expect(setTotal).to.have.been.calledOnceWithExactly(150);
      expect(setCustomer).to.not.have.been.called;
      expect(order.total).to.equal(150);
    });

    it('should write an explicit null', async () => {
      const setCustomer: SinonSpy = sinon.spy(order, 'setCustomer');
      snapshot.customer = null;

      await mapper.map(snapshot, {}, order);

      expect(setCustomer).to.have.been.calledOnceWithExactly(null);
      expect(order.customer).to.be.null;
    });

    it('should replace the collection instead of merging it', async () => {
      snapshot.items = [ItemResource.createFromNormalizedMap({id: 2})];

      await mapper.map(snapshot, {}, order);

      expect(order.items).to.have.lengthOf(1);
      expect(order.items[0]).to.equal(secondItem);
      expect(secondItem.order).to.equal(order);
      expect(existingItem.order).to.be.null;
    });

    it('should empty the collection for an empty incoming array', async () => {
      snapshot.items = [];

      await mapper.map(snapshot, {}, order);

      expect(order.items).to.be.empty;
    });

    it('should treat a reordered collection as changed', async () => {
      const removeItem: SinonSpy = sinon.spy(order, 'removeItem');
      const addItem: SinonSpy = sinon.spy(order, 'addItem');
      snapshot.items = [...(snapshot.items ?? [])].reverse();

      await mapper.map(snapshot, {}, order);

      expect(removeItem).to.have.been.calledTwice;
      expect(addItem).to.have.been.calledTwice;
      expect(order.items).to.deep.equal([secondItem, existingItem]);
    });

    it('should map a new related resource onto a new entity', async () => {
      snapshot.customer = CustomerResource.createFromNormalizedMap({name: 'Linus'});

      await mapper.map(snapshot, {}, order);

      expect(order.customer).to.not.equal(customer);
      expect(order.customer).to.be.instanceOf(CustomerEntity);
      expect(order.customer?.name).to.equal('Linus');
      expect(order.customer?.id).to.be.null;
    });
  });

  describe('collection accessors', () => {
    let book: AddressBookEntity;

    beforeEach(() => {
      book = new AddressBookEntity();
      entityManager.persist(book);
    });

    it('should use the declared adder, then the singular one, then the plural one', async () => {
      const addShippingAddress: SinonSpy = sinon.spy(book, 'addShippingAddress');
      const addBillingAddresses: SinonSpy = sinon.spy(book, 'addBillingAddresses');
      const archive: SinonSpy = sinon.spy(book, 'archive');
      const resource: AddressBookResource = AddressBookResource.createFromNormalizedMap({
        shippingAddresses: [{street: 'Main Street 1'}],
        billingAddresses: [{street: 'Main Street 2'}],
        archivedAddresses: [{street: 'Main Street 3'}],
      });

      await mapper.map(resource, {}, book);

      expect(addShippingAddress).to.have.been.calledOnce;
      expect(addBillingAddresses).to.have.been.calledOnce;
      expect(archive).to.have.been.calledOnce;
      expect(book.shippingAddresses.map(address => address.street)).to.deep.equal(['Main Street 1']);
      expect(book.billingAddresses.map(address => address.street)).to.deep.equal(['Main Street 2']);
      expect(book.archivedAddresses.map(address => address.street)).to.deep.equal(['Main Street 3']);
      expect(book.archivedAddresses[0]).to.be.instanceOf(AddressEntity);
    });

    it('should fail when a collection has no adder', async () => {
      const resource: AddressBookResource = AddressBookResource.createFromNormalizedMap({
        favouriteAddresses: [{street: 'Main Street 4'}],
      });

      await expect(mapper.map(resource, {}, book)).to.be.rejectedWith(
        ObjectMappingError,
        "Entity has no add accessor for collection property [ cls = 'AddressBookEntity', property = 'favouriteAddresses', tried = 'addFavouriteAddress, addFavouriteAddresses' ]",
      );
    });
  });
});
